/**
 * Database behavior
 *
 * Statements about the database object run from master, except file shrinks
 * which run inside the database; creation, rename, resizes and
 * `ALTER DATABASE` options run outside a transaction.
 *
 * @module packages/reconciler/reflected/behaviors/database
 */

import {
  asInteger,
  asText,
  ObjectNotFoundError,
  OperationRefusedError,
  type AttributeValue,
} from '@dbconverge/core/domain';
import type { DatabaseDefinition, DatabaseFileType } from '@dbconverge/core/ports';
import { APPLIED, skipped, type MutationResult } from '../../types.js';
import type { EntityBehavior } from '../EntityBehavior.js';
import type { ReflectedNode } from '../ReflectedNode.js';
import { numberField, textField } from '../rows.js';
import { listNamesOf, MASTER } from './shared.js';

async function sizeOf(node: ReflectedNode<'database'>, field: string): Promise<AttributeValue> {
  const row = await node.firstRow(node.context.dialect.databaseSizes(node.name), MASTER);
  return Math.trunc(numberField(row, field) ?? 0);
}

async function filePathOf(node: ReflectedNode<'database'>, fileType: DatabaseFileType): Promise<AttributeValue> {
  const row = await node.firstRow(node.context.dialect.databaseFile(node.name, fileType), MASTER);
  return textField(row, 'physical_name');
}

/**
 * Re-point a database file. The database goes offline while the operator
 * moves the file and comes back online once they confirm the move.
 */
async function moveFile(
  node: ReflectedNode<'database'>,
  fileType: DatabaseFileType,
  target: string | null
): Promise<MutationResult> {
  const { dialect, driver, confirm, logger } = node.context;
  const path = node.fullName();
  if (target === null) {
    return skipped('no file path declared');
  }

  if (await node.exists(dialect.databaseInAvailabilityGroup(node.name), MASTER)) {
    throw new OperationRefusedError(
      path,
      'Database is part of an availability group; its files must be moved manually',
      false
    );
  }

  const file = await node.firstRow(dialect.databaseFile(node.name, fileType), MASTER);
  const logicalName = textField(file, 'name');
  const currentPath = textField(file, 'physical_name');
  if (!logicalName) {
    throw new ObjectNotFoundError(path, `${fileType} file`);
  }

  if (!(await confirm.confirm(`Database ${node.name} must not be in use while its file moves. Take it offline?`))) {
    return skipped('database was not taken offline');
  }

  await driver.withAutocommit(async () => {
    await node.execute(dialect.moveDatabaseFile(node.name, logicalName, target), MASTER);
    await node.execute(dialect.setDatabaseOffline(node.name), MASTER);
  });
  logger.warn({ path, from: currentPath, to: target }, 'Database is offline until its file is moved');

  if (!(await confirm.confirm(`Has ${currentPath ?? logicalName} been moved to ${target}?`))) {
    return skipped('database left offline until its file is moved');
  }
  await driver.withAutocommit(() => node.execute(dialect.setDatabaseOnline(node.name), MASTER));
  return APPLIED;
}

/**
 * Grow a file from master, or shrink it from inside the database, to the
 * declared size.
 */
async function resizeFile(
  node: ReflectedNode<'database'>,
  fileType: DatabaseFileType,
  sizeMb: number | null
): Promise<MutationResult> {
  const { dialect, driver } = node.context;
  if (sizeMb === null) {
    return skipped('no file size declared');
  }

  const file = await node.firstRow(dialect.databaseFile(node.name, fileType), MASTER);
  const logicalName = textField(file, 'name');
  if (!logicalName) {
    throw new ObjectNotFoundError(node.fullName(), `${fileType} file`);
  }

  const current = numberField(file, 'current_size_mb') ?? 0;
  await driver.withAutocommit(async () => {
    if (sizeMb < current) {
      await node.execute(dialect.shrinkDatabaseFile(logicalName, sizeMb), { database: node.name });
    } else {
      await node.execute(dialect.growDatabaseFile(node.name, logicalName, sizeMb), MASTER);
    }
  });
  return APPLIED;
}

export const databaseBehavior: EntityBehavior<'database'> = {
  type: 'database',
  systemNames: ['master', 'tempdb', 'model', 'msdb', 'ReportServer', 'ReportServerTempDB'],
  creatable: true,

  async listNames(parent) {
    return listNamesOf(parent, parent.context.dialect.listDatabases());
  },

  async nameExists(parent, name) {
    return parent.exists(parent.context.dialect.databaseExists(name), MASTER);
  },

  async create(parent, declared) {
    const definition: DatabaseDefinition = {
      name: declared.name,
      dataFilePath: asText(declared.attribute('data_file_path')),
      logFilePath: asText(declared.attribute('log_file_path')),
      dataSize: asInteger(declared.attribute('data_size')),
      logSize: asInteger(declared.attribute('log_size')),
    };
    await parent.context.driver.withAutocommit(() =>
      parent.execute(parent.context.dialect.createDatabase(definition), MASTER)
    );
  },

  async fetchDetail(node) {
    return node.firstRow(node.context.dialect.databaseDetail(node.name), MASTER);
  },

  readers: {
    data_size: (node) => sizeOf(node, 'data_size_mb'),
    log_size: (node) => sizeOf(node, 'log_size_mb'),
    data_file_path: (node) => filePathOf(node, 'ROWS'),
    log_file_path: (node) => filePathOf(node, 'LOG'),
  },

  setters: {
    async recovery_model_desc(node, declared) {
      const model = asText(declared.attribute('recovery_model_desc')) ?? 'FULL';
      await node.context.driver.withAutocommit(() =>
        node.execute(node.context.dialect.setRecoveryModel(node.name, model), MASTER)
      );
      return APPLIED;
    },

    async owner(node, declared) {
      const owner = asText(declared.attribute('owner'));
      if (owner === null) {
        return skipped('no owner declared');
      }
      await node.context.driver.withAutocommit(() =>
        node.execute(node.context.dialect.setDatabaseOwner(node.name, owner), MASTER)
      );
      return APPLIED;
    },

    data_size: (node, declared) => resizeFile(node, 'ROWS', asInteger(declared.attribute('data_size'))),
    log_size: (node, declared) => resizeFile(node, 'LOG', asInteger(declared.attribute('log_size'))),
    data_file_path: (node, declared) => moveFile(node, 'ROWS', asText(declared.attribute('data_file_path'))),
    log_file_path: (node, declared) => moveFile(node, 'LOG', asText(declared.attribute('log_file_path'))),
  },

  async rename(node, newName) {
    await node.context.driver.withAutocommit(() =>
      node.execute(node.context.dialect.renameDatabase(node.name, newName), MASTER)
    );
  },

  deleteRefusal() {
    return 'Database deletion is not supported';
  },
};
