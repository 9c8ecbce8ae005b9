import { describe, it, expect } from 'vitest';
import { DeclarationError } from '@dbconverge/core/domain';
import { ColumnSchema, SchemaFileSchema, TableSchema } from '../schemas.js';
import { toColumn, toDeclaredServer, toTable } from '../toDeclared.js';

describe('toColumn', () => {
  it('gives decimal the server default precision and scale', () => {
    const col = toColumn(ColumnSchema.parse({ name: 'Amount', type: 'decimal' }));
    expect(col.attribute('numeric_precision')).toBe(18);
    expect(col.attribute('numeric_scale')).toBe(0);
    expect(col.attribute('datetime_precision')).toBeNull();
    expect(col.attribute('char_max_len')).toBeNull();
  });

  it('keeps declared precision and scale', () => {
    const col = toColumn(ColumnSchema.parse({ name: 'Amount', type: 'numeric', precision: 12, scale: 3 }));
    expect(col.attribute('numeric_precision')).toBe(12);
    expect(col.attribute('numeric_scale')).toBe(3);
  });

  it('gives float precision but no scale', () => {
    const col = toColumn(ColumnSchema.parse({ name: 'Ratio', type: 'float' }));
    expect(col.attribute('numeric_precision')).toBe(53);
    expect(col.attribute('numeric_scale')).toBeNull();
  });

  it('defaults datetime2 to seven fractional digits', () => {
    expect(toColumn(ColumnSchema.parse({ name: 'At', type: 'datetime2' })).attribute('datetime_precision')).toBe(7);
    expect(
      toColumn(ColumnSchema.parse({ name: 'At', type: 'datetime2', datetimePrecision: 3 })).attribute('datetime_precision')
    ).toBe(3);
  });

  it('maps max to -1', () => {
    const col = toColumn(ColumnSchema.parse({ name: 'Note', type: 'nvarchar', length: 'max' }));
    expect(col.attribute('char_max_len')).toBe(-1);
  });

  it('leaves int unparameterized', () => {
    const col = toColumn(ColumnSchema.parse({ name: 'ID', type: 'int', identity: true }));
    expect(col.attribute('data_type')).toBe('int');
    expect(col.attribute('identity')).toBe(true);
    expect(col.attribute('nullable')).toBe(false);
    expect(col.attribute('numeric_precision')).toBeNull();
  });
});

describe('toTable', () => {
  it('names keys and indexes after their columns', () => {
    const node = toTable(
      TableSchema.parse({
        name: 'Orders',
        columns: [
          { name: 'ID', type: 'int', primaryKey: true },
          { name: 'PersonID', type: 'int' },
          { name: 'Total', type: 'money' },
        ],
        indexes: [{ columns: 'PersonID', includedColumns: ['Total'] }],
        foreignKeys: [{ column: 'PersonID', references: { table: 'Person', column: 'ID' } }],
      })
    );

    expect(node.getChildren('primary_key').map((pk) => pk.name)).toEqual(['PK_id']);
    expect(node.getChildren('index').map((ix) => ix.name)).toEqual(['IX_personid__total']);
    expect(node.getChildren('foreign_key').map((fk) => fk.name)).toEqual(['FK_PersonID_dbo_Person_ID']);
  });

  it('prefers the declared primary key over column flags', () => {
    const node = toTable(
      TableSchema.parse({
        name: 'Movement',
        columns: [
          { name: 'ID', type: 'bigint', primaryKey: true },
          { name: 'MovedAt', type: 'datetime2' },
        ],
        primaryKey: { columns: ['ID', 'MovedAt'], compression: 'page' },
        partition: 'MovedAt',
      })
    );

    const [key] = node.getChildren('primary_key');
    expect(key.name).toBe('PK_id_movedat');
    expect(key.attribute('compression')).toBe('PAGE');
    expect(key.attribute('clustered')).toBe(true);
    expect(node.getChildren('partition').map((p) => p.name)).toEqual(['movedat']);
  });
});

describe('toDeclaredServer', () => {
  it('maps users to their login, defaulting to the user name', () => {
    const root = toDeclaredServer(
      SchemaFileSchema.parse({
        version: '1',
        server: {
          logins: [{ name: 'reader' }],
          databases: [
            {
              name: 'app',
              owner: 'sa',
              users: [{ name: 'reader' }, { name: 'writer', login: 'etl', dbRoles: ['db_datawriter'] }],
            },
          ],
        },
      })
    );

    const db = root.getChild('database', 'app');
    expect(db.getChild('user', 'reader').attribute('login_name')).toBe('reader');
    const writer = db.getChild('user', 'writer');
    expect(writer.attribute('login_name')).toBe('etl');
    expect(writer.attribute('db_roles')).toEqual(new Set(['db_datawriter']));
    expect(root.getChild('login', 'reader').attribute('type_desc')).toBe('SQL_LOGIN');
  });

  it('rejects two users mapped to the same login', () => {
    const file = SchemaFileSchema.parse({
      version: '1',
      server: {
        databases: [{ name: 'app', owner: 'sa', users: [{ name: 'a', login: 'shared' }, { name: 'b', login: 'shared' }] }],
      },
    });
    expect(() => toDeclaredServer(file)).toThrow(DeclarationError);
  });

  it('carries ignoreExtraChildren to the root', () => {
    const root = toDeclaredServer(
      SchemaFileSchema.parse({ version: '1', server: { ignoreExtraChildren: ['login'] } })
    );
    expect(root.ignoresExtra('login')).toBe(true);
    expect(root.ignoresExtra('database')).toBe(false);
  });
});
