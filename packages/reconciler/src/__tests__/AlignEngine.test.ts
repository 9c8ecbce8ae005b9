/**
 * AlignEngine Tests
 *
 * Alignment runs against the in-memory server: convergence, idempotence,
 * deletion gating, renames and fatal verification.
 *
 * @module packages/reconciler/__tests__/AlignEngine.test
 */

import { describe, it, expect } from 'vitest';
import pino from 'pino';
import {
  AttributeNotAlteredError,
  column,
  database,
  dateTimeColumn,
  foreignKey,
  identityColumn,
  index,
  integerColumn,
  login,
  OperationRefusedError,
  partition,
  primaryKey,
  server,
  table,
  TypeMismatchError,
  user,
  varcharColumn,
  type DeclaredNode,
  type TableInit,
} from '@dbconverge/core/domain';
import { autoApprove, PlanRecorder, type IConfirmationProvider } from '@dbconverge/core/ports';
import { AlignEngine } from '../services/AlignEngine.js';
import {
  FakeServer,
  fakeColumn,
  fakeDatabase,
  fakeIndex,
  fakeTable,
  required,
  type FakeIndex,
  type FakeTable,
} from './fixtures/FakeServer.js';

const logger = pino({ level: 'silent' });

function createEngine(fake: FakeServer, confirm: IConfirmationProvider = autoApprove): AlignEngine {
  return new AlignEngine({ driver: fake, dialect: fake, logger, confirm });
}

function person(init: Partial<TableInit> = {}): DeclaredNode<'table'> {
  return table({
    name: 'Person',
    columns: [identityColumn('ID', { primaryKey: true }), varcharColumn('Name', 255)],
    ...init,
  });
}

function appServer(...tables: DeclaredNode<'table'>[]): DeclaredNode<'server'> {
  return server({ databases: [database({ name: 'app', owner: 'sa', tables })] });
}

function livePerson(indexes: FakeIndex[] = [], name = 'Person'): FakeTable {
  return fakeTable(
    name,
    [fakeColumn('ID', 'int', { identity: true }), fakeColumn('Name', 'varchar', { charMaxLen: 255 })],
    { indexes: [fakeIndex('PK_Person', ['ID'], { primaryKey: true, clustered: true, unique: true }), ...indexes] }
  );
}

function withTables(...tables: FakeTable[]): FakeServer {
  return new FakeServer({ databases: [fakeDatabase('app', { schemas: [{ name: 'dbo', tables }] })] });
}

describe('AlignEngine', () => {
  // ==========================================================================
  // Convergence
  // ==========================================================================

  describe('convergence', () => {
    it('creates a missing table and its primary key', async () => {
      const fake = withTables();
      const engine = createEngine(fake);

      const report = await engine.alignServer(appServer(person()));

      expect(fake.mutations).toEqual(['createTable dbo Person', 'createPrimaryKey dbo Person PK_id']);
      expect(report.summary.applied).toBe(2);
      expect(report.summary.total).toBe(2);
      expect(report.outcomes[0]).toEqual({
        operation: 'create',
        entityType: 'table',
        path: 'app.dbo.Person',
        status: 'applied',
      });
    });

    it('makes no changes on a second run', async () => {
      const fake = withTables();
      const engine = createEngine(fake);

      await engine.alignServer(appServer(person()));
      const second = await engine.alignServer(appServer(person()));

      expect(fake.mutations).toHaveLength(2);
      expect(second.summary.total).toBe(0);
    });

    it('issues no changes when the server already matches', async () => {
      const fake = withTables(livePerson());

      const report = await createEngine(fake).alignServer(appServer(person()));

      expect(fake.mutations).toEqual([]);
      expect(report.outcomes).toEqual([]);
    });

    it('converges logins, database options, tables, keys and users', async () => {
      const fake = new FakeServer({
        logins: [{ name: 'app_user', typeDesc: 'SQL_LOGIN', roles: [] }],
        databases: [fakeDatabase('app')],
      });
      const address = table({
        name: 'Address',
        columns: [identityColumn('ID'), integerColumn('PersonID'), varcharColumn('Street', 100, { nullable: true })],
        primaryKey: primaryKey('ID', { name: 'PK_Address' }),
        indexes: [index('PersonID')],
        foreignKeys: [foreignKey({ column: 'PersonID', foreignTable: 'Person', foreignColumn: 'ID' })],
      });
      const declared = () =>
        server({
          logins: [login('app_user', { serverRoles: ['dbcreator'] })],
          databases: [
            database({
              name: 'app',
              owner: 'sa',
              recoveryModel: 'SIMPLE',
              tables: [person(), address],
              users: [user('app_user', 'app_user', { dbRoles: ['db_datareader'] })],
            }),
          ],
        });
      const engine = createEngine(fake);

      await engine.alignServer(declared());

      expect(fake.mutations).toEqual([
        'alterServerRole dbcreator ADD app_user',
        'setRecoveryModel app SIMPLE',
        'createTable dbo Person',
        'createPrimaryKey dbo Person PK_id',
        'createTable dbo Address',
        'createPrimaryKey dbo Address PK_Address',
        'createIndex dbo Address IX_personid primary',
        'createForeignKey dbo Address FK_dbo_Address_PersonID_dbo_Person',
        'createUser app_user app_user',
        'alterDatabaseRole db_datareader ADD app_user',
      ]);
      expect(fake.autocommitted).toEqual(['setRecoveryModel app SIMPLE']);
    });

    it('aligns only attributes without recursion', async () => {
      const fake = withTables();
      const engine = createEngine(fake);
      const root = await engine.reflect();
      const live = required(await root.getChild('database', 'app'));

      await engine.align(database({ name: 'app', owner: 'sa', recoveryModel: 'SIMPLE', tables: [person()] }), live, {
        recurse: false,
      });

      expect(fake.mutations).toEqual(['setRecoveryModel app SIMPLE']);
    });

    it('rejects nodes of different types', async () => {
      const fake = withTables();
      const engine = createEngine(fake);
      const live = required(await (await engine.reflect()).getChild('database', 'app'));

      await expect(engine.align(person(), live)).rejects.toThrow(TypeMismatchError);
    });
  });

  // ==========================================================================
  // Deletion
  // ==========================================================================

  describe('deletion of undeclared children', () => {
    it('deletes undeclared indexes before creating declared ones', async () => {
      const fake = withTables(livePerson([fakeIndex('IX_extra', ['name'])]));

      await createEngine(fake).alignServer(appServer(person({ indexes: [index('ID')] })));

      expect(fake.mutations).toEqual(['dropIndex dbo Person IX_extra', 'createIndex dbo Person IX_id primary']);
    });

    it('keeps undeclared children of an ignored type', async () => {
      const fake = withTables(livePerson([fakeIndex('IX_extra', ['name'])]));

      await createEngine(fake).alignServer(
        appServer(person({ ignoreExtraChildren: ['index'], indexes: [index('ID')] }))
      );

      expect(fake.mutations).toEqual(['createIndex dbo Person IX_id primary']);
      expect(fake.table('app', 'dbo', 'Person').indexes.map((ix) => ix.name)).toEqual([
        'PK_Person',
        'IX_extra',
        'IX_id',
      ]);
    });

    it('leaves children alone when none of their type is declared', async () => {
      const fake = withTables(livePerson([fakeIndex('IX_extra', ['name'])]));

      await createEngine(fake).alignServer(appServer(person()));

      expect(fake.mutations).toEqual([]);
    });

    it('replaces a user of the declared name that maps to another login', async () => {
      const fake = new FakeServer({
        logins: [
          { name: 'alice', typeDesc: 'SQL_LOGIN', roles: [] },
          { name: 'bob', typeDesc: 'SQL_LOGIN', roles: [] },
        ],
        databases: [fakeDatabase('app', { users: [{ name: 'bob', login: 'alice', roles: [] }] })],
      });
      const declared = server({
        logins: [login('alice'), login('bob')],
        databases: [database({ name: 'app', owner: 'sa', users: [user('bob', 'bob')] })],
      });

      const report = await createEngine(fake).alignServer(declared);

      expect(fake.mutations).toEqual(['dropUser bob', 'createUser bob bob']);
      expect(fake.database('app').users).toEqual([{ name: 'bob', login: 'bob', roles: [] }]);
      expect(report.outcomes).toEqual([
        { operation: 'delete', entityType: 'user', path: 'app.bob', status: 'applied' },
        { operation: 'create', entityType: 'user', path: 'app.bob', status: 'applied' },
      ]);
    });

    it('refuses to delete undeclared databases', async () => {
      const fake = new FakeServer({ databases: [fakeDatabase('app'), fakeDatabase('legacy')] });

      const report = await createEngine(fake).alignServer(appServer());

      expect(fake.mutations).toEqual([]);
      expect(report.outcomes).toEqual([
        {
          operation: 'delete',
          entityType: 'database',
          path: 'legacy',
          status: 'refused',
          reason: 'Database deletion is not supported',
        },
      ]);
    });
  });

  // ==========================================================================
  // Renames and matching
  // ==========================================================================

  describe('renames', () => {
    it('renames a live child found under the old name', async () => {
      const fake = withTables(livePerson([], 'People'));

      await createEngine(fake).alignServer(appServer(person({ oldName: 'People' })));

      expect(fake.mutations).toEqual(['renameTable dbo People Person']);
      expect(fake.database('app').schemas[0]?.tables.map((t) => t.name)).toEqual(['Person']);
    });

    it('matches a user by its login whatever its name', async () => {
      const fake = new FakeServer({
        logins: [{ name: 'bob', typeDesc: 'SQL_LOGIN', roles: [] }],
        databases: [fakeDatabase('app', { users: [{ name: 'robert', login: 'bob', roles: [] }] })],
      });
      const declared = server({
        logins: [login('bob')],
        databases: [database({ name: 'app', owner: 'sa', users: [user('bob', 'bob')] })],
      });

      const report = await createEngine(fake).alignServer(declared);

      expect(fake.mutations).toEqual([]);
      expect(report.outcomes).toEqual([]);
    });

    it('matches a foreign key by what it references whatever its name', async () => {
      const liveAddress = fakeTable(
        'Address',
        [fakeColumn('ID', 'int', { identity: true }), fakeColumn('PersonID', 'int'), fakeColumn('OwnerID', 'int')],
        {
          indexes: [fakeIndex('PK_Address', ['ID'], { primaryKey: true, clustered: true, unique: true })],
          foreignKeys: [
            { name: 'FK_legacy', column: 'PersonID', foreignSchema: 'dbo', foreignTable: 'Person', foreignColumn: 'ID' },
            { name: 'FK_owner', column: 'OwnerID', foreignSchema: 'dbo', foreignTable: 'Person', foreignColumn: 'ID' },
          ],
        }
      );
      const fake = withTables(livePerson(), liveAddress);
      const address = table({
        name: 'Address',
        columns: [identityColumn('ID'), integerColumn('PersonID'), integerColumn('OwnerID')],
        primaryKey: primaryKey('ID', { name: 'PK_Address' }),
        foreignKeys: [foreignKey({ column: 'PersonID', foreignTable: 'Person', foreignColumn: 'ID' })],
      });

      const report = await createEngine(fake).alignServer(appServer(person(), address));

      expect(fake.mutations).toEqual(['dropConstraint dbo Address FK_owner']);
      expect(fake.table('app', 'dbo', 'Address').foreignKeys.map((fk) => fk.name)).toEqual(['FK_legacy']);
      expect(report.outcomes).toEqual([
        { operation: 'delete', entityType: 'foreign_key', path: 'app.dbo.Address.FK_owner', status: 'applied' },
      ]);
    });

    it('matches an index by its columns whatever its name', async () => {
      const fake = withTables(livePerson([fakeIndex('ix_old', ['name'])]));

      await createEngine(fake).alignServer(appServer(person({ indexes: [index('Name')] })));

      expect(fake.mutations).toEqual([]);
      expect(fake.table('app', 'dbo', 'Person').indexes.map((ix) => ix.name)).toEqual(['PK_Person', 'ix_old']);
    });

    it('renames a structurally matching index that declares its old name', async () => {
      const fake = withTables(livePerson([fakeIndex('ix_old', ['name'])]));

      await createEngine(fake).alignServer(appServer(person({ indexes: [index('Name', { oldName: 'ix_old' })] })));

      expect(fake.mutations).toEqual(['renameIndex dbo Person ix_old IX_name']);
    });
  });

  // ==========================================================================
  // Gating and verification
  // ==========================================================================

  describe('gating', () => {
    it('plans without changing anything', async () => {
      const fake = withTables();
      const plan = new PlanRecorder();

      const report = await createEngine(fake, plan).alignServer(appServer(person()));

      expect(fake.mutations).toEqual([]);
      expect(plan.planned).toEqual(['Create Table app.dbo.Person?']);
      expect(report.summary.declined).toBe(1);
    });

    it('reports logins as not creatable', async () => {
      const fake = withTables();

      const report = await createEngine(fake).alignServer(server({ logins: [login('reporting')] }));

      expect(report.outcomes).toEqual([
        {
          operation: 'create',
          entityType: 'login',
          path: 'fake-server.reporting',
          status: 'refused',
          reason: 'Login cannot be created',
        },
      ]);
    });

    it('stops at a change the server did not apply', async () => {
      const fake = withTables(livePerson());
      fake.table('app', 'dbo', 'Person').columns[1] = fakeColumn('Name', 'varchar', { charMaxLen: 100 });
      fake.ignore('alterColumn');
      const declared = appServer(
        person({ columns: [identityColumn('ID', { primaryKey: true }), varcharColumn('Name', 255, { nullable: true })] })
      );

      await expect(createEngine(fake).alignServer(declared)).rejects.toThrow(AttributeNotAlteredError);
      expect(fake.mutations).toEqual(['alterColumn dbo Person Name']);
    });
  });

  // ==========================================================================
  // Column changes
  // ==========================================================================

  describe('column type changes', () => {
    const nvarcharPerson = () =>
      person({
        columns: [identityColumn('ID', { primaryKey: true }), column('Name', 'nvarchar', { charMaxLen: 255 })],
        indexes: [index('Name')],
      });

    it('drops dependent indexes first and recreates them afterwards', async () => {
      const fake = withTables(livePerson([fakeIndex('IX_name', ['name'])]));

      await createEngine(fake).alignServer(appServer(nvarcharPerson()));

      expect(fake.mutations).toEqual([
        'dropIndex dbo Person IX_name',
        'alterColumn dbo Person Name',
        'createIndex dbo Person IX_name primary',
      ]);
    });

    it('skips the change when a dependent index is kept', async () => {
      const fake = withTables(livePerson([fakeIndex('IX_name', ['name'])]));
      const confirm: IConfirmationProvider = {
        confirm: async (description) => !description.startsWith('Delete'),
      };

      const report = await createEngine(fake, confirm).alignServer(appServer(nvarcharPerson()));

      expect(fake.mutations).toEqual([]);
      expect(report.outcomes.map((o) => [o.operation, o.entityType, o.status])).toEqual([
        ['delete', 'index', 'declined'],
        ['update', 'column', 'skipped'],
      ]);
      expect(report.outcomes[1]?.reason).toBe('Index app.dbo.Person.IX_name depends on the column and was not dropped');
    });
  });

  describe('identity changes', () => {
    it('refuses the change on a table with a primary key', async () => {
      const fake = withTables(livePerson());
      const declared = person({ columns: [integerColumn('ID', { primaryKey: true }), varcharColumn('Name', 255)] });

      const report = await createEngine(fake).alignServer(appServer(declared));

      expect(fake.mutations).toEqual([]);
      expect(report.outcomes).toEqual([
        {
          operation: 'update',
          entityType: 'column',
          path: 'app.dbo.Person.ID',
          status: 'skipped',
          attribute: 'identity',
          from: 'true',
          to: 'false',
          reason: 'Identity cannot change on a table with a primary key',
        },
      ]);
    });

    it('drops and re-adds the column after its indexes otherwise', async () => {
      const fake = withTables(
        fakeTable('Log', [fakeColumn('id', 'int'), fakeColumn('message', 'varchar', { charMaxLen: 100 })], {
          indexes: [fakeIndex('IX_id', ['id'])],
        })
      );
      const log = table({
        name: 'Log',
        columns: [identityColumn('id'), varcharColumn('message', 100)],
        indexes: [index('id')],
      });

      const report = await createEngine(fake).alignServer(appServer(log));

      expect(fake.mutations).toEqual([
        'dropIndex dbo Log IX_id',
        'dropColumn dbo Log id',
        'addColumn dbo Log id',
        'createIndex dbo Log IX_id primary',
      ]);
      expect(fake.table('app', 'dbo', 'Log').columns.find((c) => c.name === 'id')?.identity).toBe(true);
      expect(report.outcomes.map((o) => [o.operation, o.entityType, o.path, o.status])).toEqual([
        ['delete', 'index', 'app.dbo.Log.IX_id', 'applied'],
        ['update', 'column', 'app.dbo.Log.id', 'applied'],
        ['create', 'index', 'app.dbo.Log.IX_id', 'applied'],
      ]);
    });
  });

  // ==========================================================================
  // Database files
  // ==========================================================================

  describe('database file sizes', () => {
    it('grows a file smaller than declared', async () => {
      const fake = new FakeServer({ databases: [fakeDatabase('app')] });

      const report = await createEngine(fake).alignServer(
        server({ databases: [database({ name: 'app', owner: 'sa', dataSize: 64 })] })
      );

      expect(fake.mutations).toEqual(['growDatabaseFile app app 64']);
      expect(fake.autocommitted).toEqual(['growDatabaseFile app app 64']);
      expect(fake.database('app').dataSize).toBe(64);
      expect(report.outcomes).toEqual([
        {
          operation: 'update',
          entityType: 'database',
          path: 'app',
          status: 'applied',
          attribute: 'data_size',
          from: '8',
          to: '64',
        },
      ]);
    });

    it('shrinks a file larger than declared from inside the database', async () => {
      const fake = new FakeServer({ databases: [fakeDatabase('app')] });

      const report = await createEngine(fake).alignServer(
        server({ databases: [database({ name: 'app', owner: 'sa', logSize: 2 })] })
      );

      expect(fake.mutations).toEqual(['shrinkDatabaseFile app_log 2']);
      expect(fake.autocommitted).toEqual(['shrinkDatabaseFile app_log 2']);
      expect(fake.database('app').logSize).toBe(2);
      expect(report.outcomes.map((o) => [o.attribute, o.from, o.to, o.status])).toEqual([
        ['log_size', '8', '2', 'applied'],
      ]);
    });
  });

  // ==========================================================================
  // Partitions
  // ==========================================================================

  describe('partitions', () => {
    const liveEvents = (createdType = 'datetime2') =>
      fakeTable(
        'Events',
        [fakeColumn('id', 'int'), fakeColumn('created', createdType, { datetimePrecision: 7 })],
        {
          indexes: [fakeIndex('PK_Events', ['id'], { primaryKey: true, clustered: true, unique: true })],
          range: { min: new Date('2024-03-01T10:00:00Z'), max: new Date('2024-03-02T08:00:00Z') },
        }
      );
    const events = () =>
      table({
        name: 'Events',
        columns: [integerColumn('id'), dateTimeColumn('created')],
        primaryKey: primaryKey('id', { name: 'PK_Events' }),
        partition: partition('created'),
      });

    it('partitions by day around the existing data and moves the indexes', async () => {
      const fake = withTables(liveEvents());
      const engine = createEngine(fake);

      await engine.alignServer(appServer(events()));

      expect(fake.mutations).toEqual([
        'createPartitionFunction pf_dbo_Events_created datetime2',
        'createPartitionScheme ps_dbo_Events_created pf_dbo_Events_created',
        'createIndex dbo Events PK_Events ps_dbo_Events_created',
      ]);
      expect(fake.database('app').partitionFunctions.get('pf_dbo_Events_created')).toEqual([
        '2024-02-25',
        '2024-02-26',
        '2024-02-27',
        '2024-02-28',
        '2024-02-29',
        '2024-03-01',
        '2024-03-02',
        '2024-03-03',
        '2024-03-04',
        '2024-03-05',
        '2024-03-06',
      ]);

      const second = await engine.alignServer(appServer(events()));
      expect(second.summary.total).toBe(0);
      expect(fake.mutations).toHaveLength(3);
    });

    it('moves the indexes back to the primary filegroup before dropping a replaced partition', async () => {
      const live = fakeTable(
        'Events',
        [
          fakeColumn('id', 'int'),
          fakeColumn('created', 'datetime2', { datetimePrecision: 7 }),
          fakeColumn('updated', 'datetime2', { datetimePrecision: 7 }),
        ],
        {
          indexes: [
            fakeIndex('PK_Events', ['id'], { primaryKey: true, clustered: true, unique: true }),
            fakeIndex('IX_created', ['created']),
          ],
          partition: { scheme: 'ps_dbo_Events_created', column: 'created' },
          range: { min: new Date('2024-03-01T10:00:00Z'), max: new Date('2024-03-02T08:00:00Z') },
        }
      );
      const fake = new FakeServer({
        databases: [
          fakeDatabase('app', {
            schemas: [{ name: 'dbo', tables: [live] }],
            partitionFunctions: new Map([['pf_dbo_Events_created', ['2024-03-01']]]),
            partitionSchemes: new Map([['ps_dbo_Events_created', 'pf_dbo_Events_created']]),
          }),
        ],
      });
      const declared = table({
        name: 'Events',
        columns: [integerColumn('id'), dateTimeColumn('created'), dateTimeColumn('updated')],
        primaryKey: primaryKey('id', { name: 'PK_Events' }),
        indexes: [index('created')],
        partition: partition('updated'),
      });

      const report = await createEngine(fake).alignServer(appServer(declared));

      expect(fake.mutations).toEqual([
        'createIndex dbo Events PK_Events primary',
        'createIndex dbo Events IX_created primary',
        'dropPartitionScheme ps_dbo_Events_created',
        'dropPartitionFunction pf_dbo_Events_created',
        'createPartitionFunction pf_dbo_Events_updated datetime2',
        'createPartitionScheme ps_dbo_Events_updated pf_dbo_Events_updated',
        'createIndex dbo Events PK_Events ps_dbo_Events_updated',
        'createIndex dbo Events IX_created ps_dbo_Events_updated',
      ]);
      expect([...fake.database('app').partitionSchemes.keys()]).toEqual(['ps_dbo_Events_updated']);
      expect(report.outcomes.map((o) => [o.operation, o.entityType, o.path, o.status])).toEqual([
        ['delete', 'partition', 'app.dbo.Events.ps_dbo_Events_created', 'applied'],
        ['create', 'partition', 'app.dbo.Events.updated', 'applied'],
      ]);
    });

    it('refuses a column that is not a datetime', async () => {
      const fake = withTables(liveEvents('int'));
      const declared = table({
        name: 'Events',
        columns: [integerColumn('id'), integerColumn('created')],
        primaryKey: primaryKey('id', { name: 'PK_Events' }),
        partition: partition('created'),
      });

      await expect(createEngine(fake).alignServer(appServer(declared))).rejects.toThrow(OperationRefusedError);
      expect(fake.mutations).toEqual([]);
    });
  });
});
