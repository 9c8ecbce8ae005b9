/**
 * ISchemaDialect Interface
 *
 * Port interface for statement generation. One renderer per query or change;
 * the reflected tree hands the rendered statements to the driver without
 * inspecting them. Query renderers list the row fields they yield.
 *
 * Statements about objects inside a database are executed with the
 * database's name as the execution context.
 */

import type { SqlStatement } from './sql-driver.js';

// =============================================================================
// Definitions
// =============================================================================

export interface ColumnDefinition {
  readonly name: string;
  readonly dataType: string;
  readonly charMaxLen: number | null;
  readonly datetimePrecision: number | null;
  readonly numericPrecision: number | null;
  readonly numericScale: number | null;
  readonly nullable: boolean;
  readonly identity: boolean;
}

export interface DatabaseDefinition {
  readonly name: string;
  /** File settings are left to the server when null */
  readonly dataFilePath: string | null;
  readonly logFilePath: string | null;
  /** Sizes in MB */
  readonly dataSize: number | null;
  readonly logSize: number | null;
}

export interface PrimaryKeyDefinition {
  readonly name: string;
  readonly columns: readonly string[];
  readonly clustered: boolean;
  readonly compression: string;
}

export interface IndexDefinition extends PrimaryKeyDefinition {
  readonly unique: boolean;
  readonly includedColumns: readonly string[];
}

export interface ForeignKeyDefinition {
  readonly name: string;
  readonly column: string;
  readonly foreignSchema: string;
  readonly foreignTable: string;
  readonly foreignColumn: string;
}

/**
 * Where an index is stored: the default filegroup, or a partition scheme
 * applied to a column.
 */
export type IndexPlacement = 'primary' | { readonly scheme: string; readonly column: string };

export interface CreateIndexOptions {
  /** Rebuild an index of the same name in one step */
  readonly dropExisting: boolean;
  readonly placement: IndexPlacement;
}

export type RoleAction = 'ADD' | 'DROP';

export type DatabaseFileType = 'ROWS' | 'LOG';

/**
 * - `key`: key columns, excluding a partitioning column the server added
 * - `all`: every key column
 * - `included`: non-key included columns
 */
export type IndexColumnSelection = 'key' | 'all' | 'included';

// =============================================================================
// ISchemaDialect Interface
// =============================================================================

export interface ISchemaDialect {
  // ===========================================================================
  // Server
  // ===========================================================================

  /** Rows: `name` */
  serverName(): SqlStatement;

  /** Rows: `db_name` */
  currentDatabase(): SqlStatement;

  // ===========================================================================
  // Logins
  // ===========================================================================

  /** Rows: `name` */
  listLogins(): SqlStatement;

  /** One row when the login exists */
  loginExists(login: string): SqlStatement;

  /**
   * Rows: `name`, `type_desc`, and one 0/1 field per fixed server role
   * (`sysadmin`, `securityadmin`, `serveradmin`, `setupadmin`,
   * `processadmin`, `diskadmin`, `dbcreator`, `bulkadmin`)
   */
  loginDetail(login: string): SqlStatement;

  alterServerRole(role: string, action: RoleAction, login: string): SqlStatement;

  renameLogin(login: string, newName: string): SqlStatement;

  dropLogin(login: string): SqlStatement;

  // ===========================================================================
  // Databases
  // ===========================================================================

  /** Rows: `name` */
  listDatabases(): SqlStatement;

  databaseExists(database: string): SqlStatement;

  /** Rows: `name`, `recovery_model_desc`, `owner` */
  databaseDetail(database: string): SqlStatement;

  /** Rows: `data_size_mb`, `log_size_mb` */
  databaseSizes(database: string): SqlStatement;

  /** Rows: `name` (logical file name), `physical_name`, `current_size_mb` */
  databaseFile(database: string, fileType: DatabaseFileType): SqlStatement;

  /** One row when the database is part of an availability group */
  databaseInAvailabilityGroup(database: string): SqlStatement;

  createDatabase(definition: DatabaseDefinition): SqlStatement;

  renameDatabase(database: string, newName: string): SqlStatement;

  setRecoveryModel(database: string, recoveryModel: string): SqlStatement;

  setDatabaseOwner(database: string, owner: string): SqlStatement;

  moveDatabaseFile(database: string, logicalName: string, filePath: string): SqlStatement;

  /** Runs from master */
  growDatabaseFile(database: string, logicalName: string, sizeMb: number): SqlStatement;

  /** Runs in the context of the database owning the file */
  shrinkDatabaseFile(logicalName: string, sizeMb: number): SqlStatement;

  setDatabaseOffline(database: string): SqlStatement;

  setDatabaseOnline(database: string): SqlStatement;

  // ===========================================================================
  // Schemas
  // ===========================================================================

  /** Rows: `name` */
  listSchemas(): SqlStatement;

  schemaExists(schema: string): SqlStatement;

  /** Rows: `name` */
  schemaDetail(schema: string): SqlStatement;

  createSchema(schema: string): SqlStatement;

  // ===========================================================================
  // Users
  // ===========================================================================

  /** Rows: `name` */
  listUsers(): SqlStatement;

  userExists(user: string): SqlStatement;

  /** Rows: `name`, `login_name` */
  userDetail(user: string): SqlStatement;

  /** Rows: `name`, `login_name` */
  userForLogin(login: string): SqlStatement;

  /** Rows: `role_name` */
  userRoles(user: string): SqlStatement;

  createUser(user: string, login: string): SqlStatement;

  renameUser(user: string, newName: string): SqlStatement;

  alterDatabaseRole(role: string, action: RoleAction, user: string): SqlStatement;

  dropUser(user: string): SqlStatement;

  // ===========================================================================
  // Tables
  // ===========================================================================

  /** Rows: `name` */
  listTables(schema: string): SqlStatement;

  tableExists(schema: string, table: string): SqlStatement;

  /** Rows: `name`, `type_desc` */
  tableDetail(schema: string, table: string): SqlStatement;

  createTable(schema: string, table: string, columns: readonly ColumnDefinition[]): SqlStatement;

  renameTable(schema: string, table: string, newName: string): SqlStatement;

  dropTable(schema: string, table: string): SqlStatement;

  /** Rows: `min_value`, `max_value` */
  columnRange(schema: string, table: string, column: string): SqlStatement;

  // ===========================================================================
  // Columns
  // ===========================================================================

  /** Rows: `name`, in column order */
  listColumns(schema: string, table: string): SqlStatement;

  columnExists(schema: string, table: string, column: string): SqlStatement;

  /**
   * Rows: `name`, `data_type`, `char_max_len`, `datetime_precision`,
   * `numeric_precision`, `numeric_scale`, `nullable`, `identity`
   */
  columnDetail(schema: string, table: string, column: string): SqlStatement;

  addColumn(schema: string, table: string, column: ColumnDefinition): SqlStatement;

  alterColumn(schema: string, table: string, column: ColumnDefinition): SqlStatement;

  renameColumn(schema: string, table: string, column: string, newName: string): SqlStatement;

  dropColumn(schema: string, table: string, column: string): SqlStatement;

  // ===========================================================================
  // Primary keys and indexes
  // ===========================================================================

  /** Rows: `name` */
  listPrimaryKeys(schema: string, table: string): SqlStatement;

  primaryKeyExists(schema: string, table: string, name: string): SqlStatement;

  /** Rows: `pk_name`, `column_name`, in key order */
  primaryKeyColumns(schema: string, table: string): SqlStatement;

  createPrimaryKey(schema: string, table: string, definition: PrimaryKeyDefinition): SqlStatement;

  /** Rows: `name`; clustered and nonclustered indexes that back no primary key */
  listIndexes(schema: string, table: string): SqlStatement;

  indexExists(schema: string, table: string, name: string): SqlStatement;

  /**
   * Rows: `index_name`, `type_desc`, `unique`, `is_primary_key`,
   * `is_unique_constraint`, `compression`
   */
  indexDetail(schema: string, table: string, name: string): SqlStatement;

  /** Rows: `column_name`, in key order */
  indexColumns(schema: string, table: string, name: string, selection: IndexColumnSelection): SqlStatement;

  createIndex(
    schema: string,
    table: string,
    definition: IndexDefinition,
    options: CreateIndexOptions
  ): SqlStatement;

  rebuildIndex(schema: string, table: string, name: string, compression: string): SqlStatement;

  renameIndex(schema: string, table: string, name: string, newName: string): SqlStatement;

  dropIndex(schema: string, table: string, name: string): SqlStatement;

  /** Drops a primary key, foreign key or unique constraint */
  dropConstraint(schema: string, table: string, name: string): SqlStatement;

  // ===========================================================================
  // Foreign keys
  // ===========================================================================

  /** Rows: `name` */
  listForeignKeys(schema: string, table: string): SqlStatement;

  foreignKeyExists(schema: string, table: string, name: string): SqlStatement;

  /** Rows: `constraint_name`, `column`, `foreign_schema`, `foreign_table`, `foreign_column` */
  foreignKeyDetail(schema: string, table: string, name: string): SqlStatement;

  createForeignKey(schema: string, table: string, definition: ForeignKeyDefinition): SqlStatement;

  // ===========================================================================
  // Partitions
  // ===========================================================================

  /** Rows: `ps_name` */
  listPartitions(schema: string, table: string): SqlStatement;

  partitionExists(schema: string, table: string, scheme: string): SqlStatement;

  /** Rows: `column_name`, `ps_name`, `pf_name` */
  partitionForColumn(schema: string, table: string, column: string): SqlStatement;

  /** Rows: `column_name`, `ps_name`, `pf_name` */
  partitionDetail(schema: string, table: string, scheme: string): SqlStatement;

  /** Range-right function with one boundary per `YYYY-MM-DD` value */
  createPartitionFunction(name: string, column: ColumnDefinition, boundaries: readonly string[]): SqlStatement;

  createPartitionScheme(name: string, functionName: string): SqlStatement;

  dropPartitionScheme(name: string): SqlStatement;

  dropPartitionFunction(name: string): SqlStatement;
}
