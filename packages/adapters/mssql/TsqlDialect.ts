/**
 * T-SQL Schema Dialect
 *
 * Renders catalogue queries and DDL for SQL Server. Names compared in WHERE
 * clauses are bound as named parameters; names that appear as identifiers
 * are bracket-quoted, since DDL cannot take them as parameters.
 *
 * @module packages/adapters/mssql/TsqlDialect
 */

import { DeclarationError, ErrorCodes, RECOVERY_MODELS } from '@dbconverge/core/domain';
import type {
  ColumnDefinition,
  CreateIndexOptions,
  DatabaseDefinition,
  DatabaseFileType,
  ForeignKeyDefinition,
  IndexColumnSelection,
  IndexDefinition,
  IndexPlacement,
  ISchemaDialect,
  PrimaryKeyDefinition,
  RoleAction,
  SqlParam,
  SqlStatement,
} from '@dbconverge/core/ports';
import { renderColumn, renderDataType } from './column-definition.js';
import { keyword, qualifiedName, quoteLiteral, quoteName } from './quoting.js';

// ============================================================================
// Fragments
// ============================================================================

const COMPRESSIONS = ['NONE', 'ROW', 'PAGE'] as const;

const BOUNDARY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const LOGINS = `
SELECT sl.name, sp.type_desc,
  sl.sysadmin, sl.securityadmin, sl.serveradmin, sl.setupadmin,
  sl.processadmin, sl.diskadmin, sl.dbcreator, sl.bulkadmin
FROM master.dbo.syslogins sl
JOIN sys.server_principals sp ON sp.sid = sl.sid
WHERE sl.isntuser = 0 AND sp.type_desc = 'SQL_LOGIN'`;

const USERS = `
SELECT dp.name AS name, sp.name AS login_name
FROM sys.database_principals dp
JOIN sys.server_principals sp ON dp.sid = sp.sid
WHERE dp.type_desc = 'SQL_USER'`;

const TABLES = `
SELECT t.name, t.type_desc
FROM sys.tables t
JOIN sys.schemas s ON t.schema_id = s.schema_id
WHERE s.name = @schema`;

const COLUMN_DETAIL = `
SELECT
  sc.name,
  isc.DATA_TYPE AS data_type,
  isc.CHARACTER_MAXIMUM_LENGTH AS char_max_len,
  isc.DATETIME_PRECISION AS datetime_precision,
  isc.NUMERIC_PRECISION AS numeric_precision,
  isc.NUMERIC_SCALE AS numeric_scale,
  sc.is_nullable AS nullable,
  sc.is_identity AS [identity]
FROM sys.columns sc
JOIN sys.tables t ON t.object_id = sc.object_id
JOIN sys.schemas s ON s.schema_id = t.schema_id
JOIN INFORMATION_SCHEMA.COLUMNS isc
  ON isc.TABLE_SCHEMA = s.name AND isc.TABLE_NAME = t.name AND isc.COLUMN_NAME = sc.name
WHERE s.name = @schema AND t.name = @table AND sc.name = @column`;

const INDEX_COLUMN_FILTERS: { readonly [S in IndexColumnSelection]: string } = {
  key: 'ic.is_included_column = 0 AND ic.partition_ordinal = 0',
  all: 'ic.is_included_column = 0',
  included: 'ic.is_included_column = 1',
};

const TABLE_PARTITIONS = `
SELECT c.name AS column_name, ps.name AS ps_name, pf.name AS pf_name
FROM sys.tables t
JOIN sys.indexes i ON i.object_id = t.object_id
JOIN sys.index_columns ic ON ic.index_id = i.index_id AND ic.object_id = t.object_id
JOIN sys.columns c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
JOIN sys.partition_schemes ps ON ps.data_space_id = i.data_space_id
JOIN sys.partition_functions pf ON pf.function_id = ps.function_id
WHERE t.object_id = OBJECT_ID(@object) AND ic.partition_ordinal > 0 AND i.index_id < 2`;

function sql(text: string, params?: Record<string, SqlParam>): SqlStatement {
  return params ? { text: text.trim(), params } : { text: text.trim() };
}

/** OBJECT_ID argument for a table */
function objectParam(schema: string, table: string): { object: string } {
  return { object: qualifiedName(schema, table) };
}

function compression(value: string): string {
  return keyword(value, COMPRESSIONS, 'data compression');
}

function columnList(columns: readonly string[]): string {
  return columns.map(quoteName).join(', ');
}

function placementClause(placement: IndexPlacement): string {
  return placement === 'primary' ? '[PRIMARY]' : `${quoteName(placement.scheme)}(${quoteName(placement.column)})`;
}

function fileSpec(name: string, path: string, size: number | null): string {
  const parts = [`NAME = ${quoteLiteral(name)}`, `FILENAME = ${quoteLiteral(path)}`];
  if (size !== null) {
    parts.push(`SIZE = ${Math.trunc(size)}MB`);
  }
  parts.push('MAXSIZE = UNLIMITED', 'FILEGROWTH = 10%');
  return `( ${parts.join(', ')} )`;
}

function sizeInMb(sizeMb: number): number {
  if (!Number.isInteger(sizeMb) || sizeMb < 1) {
    throw new DeclarationError(`Invalid database file size: ${sizeMb}`, {
      code: ErrorCodes.DECLARATION_INVALID_VALUE,
      suggestion: 'File sizes are whole megabytes.',
    });
  }
  return sizeMb;
}

// ============================================================================
// TsqlDialect
// ============================================================================

export class TsqlDialect implements ISchemaDialect {
  // ==========================================================================
  // Server
  // ==========================================================================

  serverName(): SqlStatement {
    return sql('SELECT @@SERVERNAME AS name');
  }

  currentDatabase(): SqlStatement {
    return sql('SELECT DB_NAME() AS db_name');
  }

  // ==========================================================================
  // Logins
  // ==========================================================================

  listLogins(): SqlStatement {
    return sql(LOGINS);
  }

  loginExists(login: string): SqlStatement {
    return sql('SELECT 1 AS found FROM master.dbo.syslogins WHERE name = @login', { login });
  }

  loginDetail(login: string): SqlStatement {
    return sql(`${LOGINS} AND sl.name = @login`, { login });
  }

  alterServerRole(role: string, action: RoleAction, login: string): SqlStatement {
    return sql(`ALTER SERVER ROLE ${quoteName(role)} ${action} MEMBER ${quoteName(login)}`);
  }

  renameLogin(login: string, newName: string): SqlStatement {
    return sql(`ALTER LOGIN ${quoteName(login)} WITH NAME = ${quoteName(newName)}`);
  }

  dropLogin(login: string): SqlStatement {
    return sql(`DROP LOGIN ${quoteName(login)}`);
  }

  // ==========================================================================
  // Databases
  // ==========================================================================

  listDatabases(): SqlStatement {
    return sql('SELECT name FROM master.sys.databases');
  }

  databaseExists(database: string): SqlStatement {
    return sql('SELECT 1 AS found FROM master.sys.databases WHERE name = @database', { database });
  }

  databaseDetail(database: string): SqlStatement {
    return sql(
      `SELECT name, recovery_model_desc, SUSER_SNAME(owner_sid) AS owner
FROM master.sys.databases
WHERE name = @database`,
      { database }
    );
  }

  databaseSizes(database: string): SqlStatement {
    return sql(
      `SELECT
  data_size_mb = CAST(SUM(CASE WHEN type_desc = 'ROWS' THEN size END) * 8. / 1024 AS DECIMAL(10,2)),
  log_size_mb = CAST(SUM(CASE WHEN type_desc = 'LOG' THEN size END) * 8. / 1024 AS DECIMAL(10,2))
FROM sys.master_files WITH (NOWAIT)
WHERE database_id = DB_ID(@database)`,
      { database }
    );
  }

  databaseFile(database: string, fileType: DatabaseFileType): SqlStatement {
    return sql(
      `SELECT name, physical_name, CAST(size / 128.0 AS INT) AS current_size_mb
FROM sys.master_files
WHERE database_id = DB_ID(@database) AND type_desc = @fileType`,
      { database, fileType }
    );
  }

  databaseInAvailabilityGroup(database: string): SqlStatement {
    return sql('SELECT 1 AS found FROM sys.dm_hadr_database_replica_states WHERE database_id = DB_ID(@database)', {
      database,
    });
  }

  createDatabase(definition: DatabaseDefinition): SqlStatement {
    const lines = [`CREATE DATABASE ${quoteName(definition.name)}`];
    if (definition.dataFilePath !== null) {
      lines.push(' CONTAINMENT = NONE', ' ON PRIMARY', fileSpec(definition.name, definition.dataFilePath, definition.dataSize));
      if (definition.logFilePath !== null) {
        lines.push(' LOG ON', fileSpec(`${definition.name}_log`, definition.logFilePath, definition.logSize));
      }
    }
    return sql(lines.join('\n'));
  }

  renameDatabase(database: string, newName: string): SqlStatement {
    return sql(`ALTER DATABASE ${quoteName(database)} MODIFY NAME = ${quoteName(newName)}`);
  }

  setRecoveryModel(database: string, recoveryModel: string): SqlStatement {
    const model = keyword(recoveryModel, RECOVERY_MODELS, 'recovery model');
    return sql(`ALTER DATABASE ${quoteName(database)} SET RECOVERY ${model}`);
  }

  setDatabaseOwner(database: string, owner: string): SqlStatement {
    return sql(`ALTER AUTHORIZATION ON DATABASE::${quoteName(database)} TO ${quoteName(owner)}`);
  }

  moveDatabaseFile(database: string, logicalName: string, filePath: string): SqlStatement {
    return sql(
      `ALTER DATABASE ${quoteName(database)} MODIFY FILE (NAME = ${quoteLiteral(logicalName)}, FILENAME = ${quoteLiteral(filePath)})`
    );
  }

  growDatabaseFile(database: string, logicalName: string, sizeMb: number): SqlStatement {
    return sql(
      `ALTER DATABASE ${quoteName(database)} MODIFY FILE (NAME = ${quoteLiteral(logicalName)}, SIZE = ${sizeInMb(sizeMb)}MB)`
    );
  }

  shrinkDatabaseFile(logicalName: string, sizeMb: number): SqlStatement {
    return sql(`DBCC SHRINKFILE (${quoteLiteral(logicalName)}, ${sizeInMb(sizeMb)})`);
  }

  setDatabaseOffline(database: string): SqlStatement {
    return sql(`ALTER DATABASE ${quoteName(database)} SET OFFLINE WITH ROLLBACK IMMEDIATE`);
  }

  setDatabaseOnline(database: string): SqlStatement {
    return sql(`ALTER DATABASE ${quoteName(database)} SET ONLINE`);
  }

  // ==========================================================================
  // Schemas
  // ==========================================================================

  listSchemas(): SqlStatement {
    // ids from 16384 are the fixed database roles
    return sql('SELECT name FROM sys.schemas WHERE schema_id < 16384');
  }

  schemaExists(schema: string): SqlStatement {
    return sql('SELECT 1 AS found FROM sys.schemas WHERE name = @schema', { schema });
  }

  schemaDetail(schema: string): SqlStatement {
    return sql('SELECT name FROM sys.schemas WHERE name = @schema', { schema });
  }

  createSchema(schema: string): SqlStatement {
    return sql(`CREATE SCHEMA ${quoteName(schema)}`);
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  listUsers(): SqlStatement {
    return sql(USERS);
  }

  userExists(user: string): SqlStatement {
    return sql("SELECT 1 AS found FROM sys.database_principals WHERE type = 'S' AND name = @user", { user });
  }

  userDetail(user: string): SqlStatement {
    return sql(`${USERS} AND dp.name = @user`, { user });
  }

  userForLogin(login: string): SqlStatement {
    return sql(`${USERS} AND sp.name = @login`, { login });
  }

  userRoles(user: string): SqlStatement {
    return sql(
      `SELECT role.name AS role_name
FROM sys.database_role_members drm
JOIN sys.database_principals role ON drm.role_principal_id = role.principal_id
JOIN sys.database_principals member ON drm.member_principal_id = member.principal_id
WHERE role.type = 'R' AND member.name = @user`,
      { user }
    );
  }

  createUser(user: string, login: string): SqlStatement {
    return sql(`CREATE USER ${quoteName(user)} FOR LOGIN ${quoteName(login)} WITH DEFAULT_SCHEMA = [dbo]`);
  }

  renameUser(user: string, newName: string): SqlStatement {
    return sql(`ALTER USER ${quoteName(user)} WITH NAME = ${quoteName(newName)}`);
  }

  alterDatabaseRole(role: string, action: RoleAction, user: string): SqlStatement {
    return sql(`ALTER ROLE ${quoteName(role)} ${action} MEMBER ${quoteName(user)}`);
  }

  dropUser(user: string): SqlStatement {
    return sql(`DROP USER ${quoteName(user)}`);
  }

  // ==========================================================================
  // Tables
  // ==========================================================================

  listTables(schema: string): SqlStatement {
    return sql(TABLES, { schema });
  }

  tableExists(schema: string, table: string): SqlStatement {
    return sql(
      'SELECT 1 AS found FROM INFORMATION_SCHEMA.TABLES WHERE TABLE_SCHEMA = @schema AND TABLE_NAME = @table',
      { schema, table }
    );
  }

  tableDetail(schema: string, table: string): SqlStatement {
    return sql(`${TABLES} AND t.name = @table`, { schema, table });
  }

  createTable(schema: string, table: string, columns: readonly ColumnDefinition[]): SqlStatement {
    if (columns.length === 0) {
      throw new DeclarationError(`Table "${schema}.${table}" declares no columns`, {
        code: ErrorCodes.DECLARATION_INVALID_VALUE,
      });
    }
    return sql(`CREATE TABLE ${qualifiedName(schema, table)} (${columns.map(renderColumn).join(', ')}) ON [PRIMARY]`);
  }

  renameTable(schema: string, table: string, newName: string): SqlStatement {
    return sql('EXEC sp_rename @object, @newName', { ...objectParam(schema, table), newName });
  }

  dropTable(schema: string, table: string): SqlStatement {
    return sql(`DROP TABLE ${qualifiedName(schema, table)}`);
  }

  columnRange(schema: string, table: string, column: string): SqlStatement {
    const quoted = quoteName(column);
    return sql(`SELECT MIN(${quoted}) AS min_value, MAX(${quoted}) AS max_value FROM ${qualifiedName(schema, table)}`);
  }

  // ==========================================================================
  // Columns
  // ==========================================================================

  listColumns(schema: string, table: string): SqlStatement {
    return sql('SELECT name FROM sys.columns WHERE object_id = OBJECT_ID(@object) ORDER BY column_id', objectParam(schema, table));
  }

  columnExists(schema: string, table: string, column: string): SqlStatement {
    return sql('SELECT 1 AS found FROM sys.columns WHERE object_id = OBJECT_ID(@object) AND name = @column', {
      ...objectParam(schema, table),
      column,
    });
  }

  columnDetail(schema: string, table: string, column: string): SqlStatement {
    return sql(COLUMN_DETAIL, { schema, table, column });
  }

  addColumn(schema: string, table: string, column: ColumnDefinition): SqlStatement {
    return sql(`ALTER TABLE ${qualifiedName(schema, table)} ADD ${renderColumn(column)}`);
  }

  alterColumn(schema: string, table: string, column: ColumnDefinition): SqlStatement {
    // identity cannot be changed by ALTER COLUMN
    return sql(`ALTER TABLE ${qualifiedName(schema, table)} ALTER COLUMN ${renderColumn({ ...column, identity: false })}`);
  }

  renameColumn(schema: string, table: string, column: string, newName: string): SqlStatement {
    return sql("EXEC sp_rename @object, @newName, 'COLUMN'", { object: qualifiedName(schema, table, column), newName });
  }

  dropColumn(schema: string, table: string, column: string): SqlStatement {
    return sql(`ALTER TABLE ${qualifiedName(schema, table)} DROP COLUMN ${quoteName(column)}`);
  }

  // ==========================================================================
  // Primary keys and indexes
  // ==========================================================================

  listPrimaryKeys(schema: string, table: string): SqlStatement {
    return sql('SELECT name FROM sys.indexes WHERE is_primary_key = 1 AND object_id = OBJECT_ID(@object)', objectParam(schema, table));
  }

  primaryKeyExists(schema: string, table: string, name: string): SqlStatement {
    return sql(
      'SELECT 1 AS found FROM sys.indexes WHERE is_primary_key = 1 AND name = @name AND object_id = OBJECT_ID(@object)',
      { ...objectParam(schema, table), name }
    );
  }

  primaryKeyColumns(schema: string, table: string): SqlStatement {
    return sql(
      `SELECT kc.name AS pk_name, c.name AS column_name
FROM sys.key_constraints kc
JOIN sys.index_columns ic ON kc.parent_object_id = ic.object_id AND kc.unique_index_id = ic.index_id
JOIN sys.columns c ON ic.object_id = c.object_id AND ic.column_id = c.column_id
WHERE kc.[type] = 'PK' AND c.object_id = OBJECT_ID(@object)
ORDER BY ic.key_ordinal`,
      objectParam(schema, table)
    );
  }

  createPrimaryKey(schema: string, table: string, definition: PrimaryKeyDefinition): SqlStatement {
    const clustering = definition.clustered ? 'CLUSTERED' : 'NONCLUSTERED';
    return sql(
      `ALTER TABLE ${qualifiedName(schema, table)} ADD CONSTRAINT ${quoteName(definition.name)} PRIMARY KEY ${clustering} (${columnList(definition.columns)}) WITH (DATA_COMPRESSION = ${compression(definition.compression)})`
    );
  }

  listIndexes(schema: string, table: string): SqlStatement {
    return sql(
      'SELECT name FROM sys.indexes WHERE is_primary_key = 0 AND type IN (1, 2) AND object_id = OBJECT_ID(@object)',
      objectParam(schema, table)
    );
  }

  indexExists(schema: string, table: string, name: string): SqlStatement {
    return sql('SELECT 1 AS found FROM sys.indexes WHERE name = @name AND object_id = OBJECT_ID(@object)', {
      ...objectParam(schema, table),
      name,
    });
  }

  indexDetail(schema: string, table: string, name: string): SqlStatement {
    return sql(
      `SELECT
  ind.name AS index_name,
  ind.type_desc,
  ind.is_unique AS [unique],
  ind.is_primary_key,
  ind.is_unique_constraint,
  sp.data_compression_desc AS compression
FROM sys.indexes ind
JOIN sys.partitions sp ON sp.object_id = ind.object_id AND sp.index_id = ind.index_id
WHERE ind.object_id = OBJECT_ID(@object) AND ind.name = @name AND sp.partition_number = 1`,
      { ...objectParam(schema, table), name }
    );
  }

  indexColumns(schema: string, table: string, name: string, selection: IndexColumnSelection): SqlStatement {
    return sql(
      `SELECT col.name AS column_name
FROM sys.indexes ind
JOIN sys.index_columns ic ON ind.object_id = ic.object_id AND ind.index_id = ic.index_id
JOIN sys.columns col ON ic.object_id = col.object_id AND ic.column_id = col.column_id
WHERE ind.name = @name AND ind.object_id = OBJECT_ID(@object) AND ${INDEX_COLUMN_FILTERS[selection]}
ORDER BY ic.key_ordinal, ic.index_column_id`,
      { ...objectParam(schema, table), name }
    );
  }

  createIndex(schema: string, table: string, definition: IndexDefinition, options: CreateIndexOptions): SqlStatement {
    const head = [
      'CREATE',
      ...(definition.unique ? ['UNIQUE'] : []),
      definition.clustered ? 'CLUSTERED' : 'NONCLUSTERED',
      'INDEX',
      quoteName(definition.name),
      'ON',
      qualifiedName(schema, table),
      `(${columnList(definition.columns)})`,
    ];
    if (definition.includedColumns.length > 0) {
      head.push(`INCLUDE (${columnList(definition.includedColumns)})`);
    }
    const settings = `DATA_COMPRESSION = ${compression(definition.compression)}, DROP_EXISTING = ${options.dropExisting ? 'ON' : 'OFF'}`;
    return sql(`${head.join(' ')} WITH (${settings}) ON ${placementClause(options.placement)}`);
  }

  rebuildIndex(schema: string, table: string, name: string, compressionName: string): SqlStatement {
    return sql(
      `ALTER INDEX ${quoteName(name)} ON ${qualifiedName(schema, table)} REBUILD PARTITION = ALL WITH (DATA_COMPRESSION = ${compression(compressionName)})`
    );
  }

  renameIndex(schema: string, table: string, name: string, newName: string): SqlStatement {
    return sql("EXEC sp_rename @object, @newName, 'INDEX'", { object: qualifiedName(schema, table, name), newName });
  }

  dropIndex(schema: string, table: string, name: string): SqlStatement {
    return sql(`DROP INDEX ${quoteName(name)} ON ${qualifiedName(schema, table)}`);
  }

  dropConstraint(schema: string, table: string, name: string): SqlStatement {
    return sql(`ALTER TABLE ${qualifiedName(schema, table)} DROP CONSTRAINT ${quoteName(name)}`);
  }

  // ==========================================================================
  // Foreign keys
  // ==========================================================================

  listForeignKeys(schema: string, table: string): SqlStatement {
    return sql('SELECT name FROM sys.foreign_keys WHERE parent_object_id = OBJECT_ID(@object)', objectParam(schema, table));
  }

  foreignKeyExists(schema: string, table: string, name: string): SqlStatement {
    return sql('SELECT 1 AS found FROM sys.foreign_keys WHERE parent_object_id = OBJECT_ID(@object) AND name = @name', {
      ...objectParam(schema, table),
      name,
    });
  }

  foreignKeyDetail(schema: string, table: string, name: string): SqlStatement {
    return sql(
      `SELECT
  fk.name AS constraint_name,
  COL_NAME(fkc.parent_object_id, fkc.parent_column_id) AS [column],
  OBJECT_SCHEMA_NAME(fkc.referenced_object_id) AS foreign_schema,
  OBJECT_NAME(fkc.referenced_object_id) AS foreign_table,
  COL_NAME(fkc.referenced_object_id, fkc.referenced_column_id) AS foreign_column
FROM sys.foreign_key_columns fkc
JOIN sys.foreign_keys fk ON fk.object_id = fkc.constraint_object_id
WHERE fkc.parent_object_id = OBJECT_ID(@object) AND fk.name = @name`,
      { ...objectParam(schema, table), name }
    );
  }

  createForeignKey(schema: string, table: string, definition: ForeignKeyDefinition): SqlStatement {
    return sql(
      `ALTER TABLE ${qualifiedName(schema, table)} ADD CONSTRAINT ${quoteName(definition.name)} FOREIGN KEY (${quoteName(definition.column)}) REFERENCES ${qualifiedName(definition.foreignSchema, definition.foreignTable)} (${quoteName(definition.foreignColumn)})`
    );
  }

  // ==========================================================================
  // Partitions
  // ==========================================================================

  listPartitions(schema: string, table: string): SqlStatement {
    return sql(
      `SELECT ps.name AS ps_name
FROM sys.indexes i
JOIN sys.partition_schemes ps ON ps.data_space_id = i.data_space_id
WHERE i.object_id = OBJECT_ID(@object) AND i.type IN (0, 1)`,
      objectParam(schema, table)
    );
  }

  partitionExists(schema: string, table: string, scheme: string): SqlStatement {
    return sql(
      `SELECT 1 AS found
FROM sys.indexes i
JOIN sys.partition_schemes ps ON ps.data_space_id = i.data_space_id
WHERE i.object_id = OBJECT_ID(@object) AND i.type IN (0, 1) AND ps.name = @scheme`,
      { ...objectParam(schema, table), scheme }
    );
  }

  partitionForColumn(schema: string, table: string, column: string): SqlStatement {
    return sql(`${TABLE_PARTITIONS} AND c.name = @column`, { ...objectParam(schema, table), column });
  }

  partitionDetail(schema: string, table: string, scheme: string): SqlStatement {
    return sql(`${TABLE_PARTITIONS} AND ps.name = @scheme`, { ...objectParam(schema, table), scheme });
  }

  createPartitionFunction(name: string, column: ColumnDefinition, boundaries: readonly string[]): SqlStatement {
    const invalid = boundaries.find((boundary) => !BOUNDARY_PATTERN.test(boundary));
    if (invalid !== undefined) {
      throw new DeclarationError(`Invalid partition boundary: ${invalid}`, {
        code: ErrorCodes.DECLARATION_INVALID_VALUE,
        suggestion: 'Boundaries are YYYY-MM-DD dates.',
      });
    }
    const values = boundaries.map((boundary) => `'${boundary}'`).join(', ');
    return sql(
      `CREATE PARTITION FUNCTION ${quoteName(name)} (${renderDataType(column)}) AS RANGE RIGHT FOR VALUES (${values})`
    );
  }

  createPartitionScheme(name: string, functionName: string): SqlStatement {
    return sql(`CREATE PARTITION SCHEME ${quoteName(name)} AS PARTITION ${quoteName(functionName)} ALL TO ([PRIMARY])`);
  }

  dropPartitionScheme(name: string): SqlStatement {
    return sql(`DROP PARTITION SCHEME ${quoteName(name)}`);
  }

  dropPartitionFunction(name: string): SqlStatement {
    return sql(`DROP PARTITION FUNCTION ${quoteName(name)}`);
  }
}
