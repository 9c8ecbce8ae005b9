/**
 * Schema File to Declared Tree
 *
 * Builds the declared tree from a validated schema file. Type arguments the
 * file leaves out get the server's defaults, so an unqualified `decimal` or
 * `datetime2` compares equal to what the server reports once created.
 *
 * @module packages/cli/commands/schema/toDeclared
 */

import {
  carriesCharLength,
  carriesDatetimePrecision,
  carriesNumericPrecision,
  carriesNumericScale,
  column,
  database,
  DEFAULT_DATETIME_PRECISION,
  foreignKey,
  index,
  login,
  partition,
  primaryKey,
  schema,
  server,
  table,
  user,
  type DeclaredColumn,
  type DeclaredNode,
} from '@dbconverge/core/domain';
import type {
  ColumnConfig,
  DatabaseConfig,
  LoginConfig,
  SchemaConfig,
  SchemaFile,
  TableConfig,
  UserConfig,
} from './schemas.js';

/** Precision the server gives a numeric type declared without one */
const DEFAULT_NUMERIC_PRECISION: Readonly<Record<string, number>> = {
  decimal: 18,
  numeric: 18,
  float: 53,
  real: 24,
};

function charLength(config: ColumnConfig): number | null {
  if (!carriesCharLength(config.type) || config.length === undefined) {
    return null;
  }
  return config.length === 'max' ? -1 : config.length;
}

export function toColumn(config: ColumnConfig): DeclaredColumn {
  const { type } = config;
  return column(config.name, type, {
    oldName: config.oldName,
    nullable: config.nullable,
    identity: config.identity,
    primaryKey: config.primaryKey,
    charMaxLen: charLength(config),
    datetimePrecision: carriesDatetimePrecision(type) ? (config.datetimePrecision ?? DEFAULT_DATETIME_PRECISION) : null,
    numericPrecision: carriesNumericPrecision(type) ? (config.precision ?? DEFAULT_NUMERIC_PRECISION[type] ?? null) : null,
    numericScale: carriesNumericScale(type) ? (config.scale ?? 0) : null,
  });
}

export function toTable(config: TableConfig): DeclaredNode<'table'> {
  return table({
    name: config.name,
    oldName: config.oldName,
    ignoreExtraChildren: config.ignoreExtraChildren,
    columns: config.columns.map(toColumn),
    primaryKey: config.primaryKey
      ? primaryKey(config.primaryKey.columns, {
          name: config.primaryKey.name,
          clustered: config.primaryKey.clustered,
          compression: config.primaryKey.compression,
        })
      : undefined,
    indexes: config.indexes.map((idx) =>
      index(idx.columns, {
        name: idx.name,
        oldName: idx.oldName,
        clustered: idx.clustered,
        unique: idx.unique,
        compression: idx.compression,
        includedColumns: idx.includedColumns,
      })
    ),
    partition: config.partition !== undefined ? partition(config.partition) : undefined,
    foreignKeys: config.foreignKeys.map((fk) =>
      foreignKey({
        column: fk.column,
        foreignSchema: fk.references.schema,
        foreignTable: fk.references.table,
        foreignColumn: fk.references.column,
      })
    ),
  });
}

function toSchema(config: SchemaConfig): DeclaredNode<'schema'> {
  return schema({
    name: config.name,
    oldName: config.oldName,
    ignoreExtraChildren: config.ignoreExtraChildren,
    tables: config.tables.map(toTable),
  });
}

function toUser(config: UserConfig): DeclaredNode<'user'> {
  return user(config.name, config.login ?? config.name, { oldName: config.oldName, dbRoles: config.dbRoles });
}

function toDatabase(config: DatabaseConfig): DeclaredNode<'database'> {
  return database({
    name: config.name,
    oldName: config.oldName,
    ignoreExtraChildren: config.ignoreExtraChildren,
    owner: config.owner,
    recoveryModel: config.recoveryModel,
    dataFileDir: config.dataFileDir,
    logFileDir: config.logFileDir,
    dataFileName: config.dataFileName,
    logFileName: config.logFileName,
    dataSize: config.dataSize,
    logSize: config.logSize,
    schemas: config.schemas?.map(toSchema),
    tables: config.tables?.map(toTable),
    users: config.users.map(toUser),
  });
}

function toLogin(config: LoginConfig): DeclaredNode<'login'> {
  return login(config.name, { oldName: config.oldName, typeDesc: config.type, serverRoles: config.serverRoles });
}

/**
 * @throws DeclarationError when the file declares an invalid tree
 */
export function toDeclaredServer(file: SchemaFile): DeclaredNode<'server'> {
  return server({
    ignoreExtraChildren: file.server.ignoreExtraChildren,
    logins: file.server.logins.map(toLogin),
    databases: file.server.databases.map(toDatabase),
  });
}
