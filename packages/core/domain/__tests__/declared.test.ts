/**
 * Declared Tree Tests
 */

import { describe, it, expect } from 'vitest';
import {
  addTable,
  clusteredIndexColumns,
  database,
  DeclaredNode,
  foreignKey,
  getTable,
  identityColumn,
  index,
  integerColumn,
  login,
  numericColumn,
  partition,
  primaryKey,
  schema,
  server,
  table,
  user,
  userForLogin,
  varcharColumn,
  floatColumn,
} from '../declared.js';
import {
  AttributeSetError,
  ChildNotFoundError,
  DeclarationError,
  DuplicateChildError,
  InvalidChildError,
} from '../errors.js';

function personTable() {
  return table({
    name: 'Person',
    columns: [identityColumn('ID', { primaryKey: true }), varcharColumn('Name', 255)],
  });
}

describe('DeclaredNode', () => {
  it('truncates names to 128 characters', () => {
    const node = schema({ name: 'x'.repeat(200) });
    expect(node.name).toHaveLength(128);
  });

  it('rejects an unexpected attribute', () => {
    const attributes = { type_desc: 'SQL_LOGIN', server_roles: null, password: 'test-secret' };
    expect(() => new DeclaredNode('login', { name: 'app', attributes })).toThrow(AttributeSetError);
  });

  it('lists every unexpected attribute', () => {
    const attributes = { column: 'created', boundary: 'daily' };
    try {
      new DeclaredNode('partition', { name: 'p', attributes });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AttributeSetError);
      expect(error instanceof AttributeSetError ? error.details : []).toEqual(['unexpected attribute: boundary']);
    }
  });

  it('rejects a value of the wrong kind', () => {
    expect(() => new DeclaredNode('partition', { name: 'p', attributes: { column: 7 } })).toThrow(
      'Attribute "column" of partition must be text'
    );
  });

  it('rejects a child type the parent does not accept', () => {
    const node = schema({ name: 'dbo' });
    expect(() => node.addChild(integerColumn('x'))).toThrow(InvalidChildError);
  });

  it('rejects siblings with the same name regardless of case', () => {
    const node = schema({ name: 'dbo', tables: [table({ name: 'Person' })] });
    expect(() => node.addChild(table({ name: 'PERSON' }))).toThrow(DuplicateChildError);
  });

  it('rejects indexes over the same key columns', () => {
    expect(() =>
      table({
        name: 't',
        columns: [integerColumn('x')],
        indexes: [index('x'), index(['X'], { name: 'IX_other' })],
      })
    ).toThrow(DuplicateChildError);
  });

  it('rejects a second partition', () => {
    const node = table({ name: 't', partition: partition('created') });
    expect(() => node.addChild(partition('updated'))).toThrow(DuplicateChildError);
  });

  it('rejects two users for one login', () => {
    const db = database({ name: 'app', owner: 'sa', users: [user('reader', 'app_login')] });
    expect(() => db.addChild(user('writer', 'APP_LOGIN'))).toThrow(DuplicateChildError);
  });

  it('looks children up by type and name', () => {
    const node = schema({ name: 'dbo', tables: [personTable()] });
    expect(node.getChild('table', 'person').name).toBe('Person');
    expect(() => node.getChild('table', 'Address')).toThrow(ChildNotFoundError);
  });

  it('resolves a chain of names across child types', () => {
    const root = server({ databases: [database({ name: 'app', owner: 'sa', tables: [personTable()] })] });
    const resolved = root.resolve('app', 'dbo', 'Person', 'Name');
    expect(resolved.type).toBe('column');
    expect(resolved.path).toBe('app.dbo.Person.Name');
    expect(() => root.resolve('app', 'sales')).toThrow('No child named "sales" under app');
  });

  it('applies the ignore-extra-children policy', () => {
    expect(schema({ name: 'a' }).ignoresExtra('table')).toBe(false);
    expect(schema({ name: 'a', ignoreExtraChildren: true }).ignoresExtra('table')).toBe(true);
    const node = table({ name: 't', ignoreExtraChildren: ['index'] });
    expect(node.ignoresExtra('index')).toBe(true);
    expect(node.ignoresExtra('column')).toBe(false);
  });
});

describe('column builders', () => {
  it('builds an identity column', () => {
    const col = identityColumn('ID');
    expect(col.attribute('data_type')).toBe('int');
    expect(col.attribute('identity')).toBe(true);
    expect(col.attribute('nullable')).toBe(false);
    expect(col.attribute('char_max_len')).toBeNull();
  });

  it('picks float precision by size', () => {
    expect(floatColumn('w').attribute('numeric_precision')).toBe(53);
    expect(floatColumn('w', { small: true }).attribute('numeric_precision')).toBe(24);
  });

  it('requires scale below precision', () => {
    expect(() => numericColumn('amount', 4, 4)).toThrow(DeclarationError);
    expect(numericColumn('amount', 10, 2).attribute('numeric_scale')).toBe(2);
  });
});

describe('key and index builders', () => {
  it('derives index names from columns', () => {
    expect(index(['Name', 'Age']).name).toBe('IX_name_age');
    expect(index('Name', { includedColumns: ['Age'] }).name).toBe('IX_name__age');
    expect(primaryKey('ID').name).toBe('PK_id');
  });

  it('lower-cases key columns', () => {
    expect(index(['Name']).attribute('columns')).toEqual(['name']);
  });

  it('stores included columns as a set', () => {
    const ix = index('a', { includedColumns: ['B'] });
    expect(ix.attribute('included_columns')).toEqual(new Set(['b']));
    expect(index('a').attribute('included_columns')).toBeNull();
  });

  it('defaults the foreign schema to dbo', () => {
    const fk = foreignKey({ column: 'AddressID', foreignTable: 'Address', foreignColumn: 'ID' });
    expect(fk.attribute('foreign_schema')).toBe('dbo');
  });
});

describe('table', () => {
  it('declares a primary key from a flagged column', () => {
    const node = personTable();
    const [pk] = node.getChildren('primary_key');
    expect(pk?.attribute('columns')).toEqual(['id']);
    expect(pk?.attribute('clustered')).toBe(true);
  });

  it('keeps an explicit primary key', () => {
    const node = table({
      name: 't',
      columns: [identityColumn('ID', { primaryKey: true }), integerColumn('Other')],
      primaryKey: primaryKey('Other', { clustered: false }),
    });
    expect(node.getChildren('primary_key').map((pk) => pk.name)).toEqual(['PK_other']);
  });

  it('finds the clustered index columns', () => {
    const node = table({ name: 't', indexes: [index('a'), index(['b', 'c'], { clustered: true })] });
    expect(clusteredIndexColumns(node)).toEqual(['b', 'c']);
    expect(clusteredIndexColumns(table({ name: 'u' }))).toBeNull();
  });
});

describe('database', () => {
  it('places shorthand tables in dbo', () => {
    const db = database({ name: 'app', owner: 'sa', tables: [personTable()] });
    expect(getTable(db, 'Person').name).toBe('Person');
  });

  it('refuses tables together with schemas', () => {
    expect(() =>
      database({ name: 'app', owner: 'sa', tables: [personTable()], schemas: [schema({ name: 'sales' })] })
    ).toThrow('Database "app": declare either tables or schemas, not both');
  });

  it('validates the recovery model', () => {
    expect(() => database({ name: 'app', owner: 'sa', recoveryModel: 'partial' })).toThrow(
      'Invalid database recovery model: partial'
    );
    expect(database({ name: 'app', owner: 'sa', recoveryModel: 'simple' }).attribute('recovery_model_desc')).toBe(
      'SIMPLE'
    );
  });

  it('derives file paths and log size from the data directory', () => {
    const db = database({ name: 'app', owner: 'sa', dataFileDir: 'D:/data', dataSize: 1000 });
    expect(db.attribute('data_file_path')).toBe('D:\\data\\app.mdf');
    expect(db.attribute('log_file_path')).toBe('D:\\data\\app_log.ldf');
    expect(db.attribute('log_size')).toBe(100);
  });

  it('requires a data size with a data directory', () => {
    expect(() => database({ name: 'app', owner: 'sa', dataFileDir: 'D:/data' })).toThrow(DeclarationError);
  });

  it('leaves file settings unmanaged by default', () => {
    const db = database({ name: 'app', owner: 'sa' });
    expect(db.attribute('data_file_path')).toBeNull();
    expect(db.attribute('data_size')).toBeNull();
  });

  it('adds tables to a new or existing schema', () => {
    const db = database({ name: 'app', owner: 'sa' });
    addTable(db, table({ name: 'a' }), 'sales');
    addTable(db, table({ name: 'b' }), 'Sales');
    expect(db.getChildren('schema').map((s) => s.name)).toEqual(['sales']);
    expect(getTable(db, 'b', 'sales').path).toBe('app.sales.b');
  });
});

describe('logins and users', () => {
  it('maps a user onto its login', () => {
    const appLogin = login('app', { serverRoles: ['dbcreator'] });
    const appUser = userForLogin(appLogin, { dbRoles: ['db_datareader'] });
    expect(appUser.name).toBe('app');
    expect(appUser.attribute('login_name')).toBe('app');
    expect(appUser.attribute('db_roles')).toEqual(new Set(['db_datareader']));
    expect(appLogin.attribute('type_desc')).toBe('SQL_LOGIN');
  });
});
