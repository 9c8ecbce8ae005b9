/**
 * Partition behavior
 *
 * A table is partitioned by day on one datetime column. Creating the
 * partition adds a range function and scheme and moves every index of the
 * table onto the scheme; deleting it moves the indexes back first.
 *
 * @module packages/reconciler/reflected/behaviors/partition
 */

import {
  asBoolean,
  asNames,
  asText,
  ObjectNotFoundError,
  OperationRefusedError,
  PARTITIONABLE_TYPES,
} from '@dbconverge/core/domain';
import type { IndexDefinition, IndexPlacement } from '@dbconverge/core/ports';
import { APPLIED } from '../../types.js';
import type { EntityBehavior } from '../EntityBehavior.js';
import type { ReflectedNode } from '../ReflectedNode.js';
import { dateField, textField } from '../rows.js';
import { listNamesOf, liveColumnDefinition, tableOf } from './shared.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Days of data kept in buffer partitions before the first and after the last value */
export const BOUNDARY_BUFFER_DAYS = 5;

function startOfDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Daily `YYYY-MM-DD` boundaries from `BOUNDARY_BUFFER_DAYS` before the first
 * day up to, not including, `BOUNDARY_BUFFER_DAYS` after the last.
 */
export function dailyBoundaries(first: Date, last: Date): string[] {
  const start = startOfDay(first) - BOUNDARY_BUFFER_DAYS * DAY_MS;
  const end = startOfDay(last) + BOUNDARY_BUFFER_DAYS * DAY_MS;
  const boundaries: string[] = [];
  for (let day = start; day < end; day += DAY_MS) {
    boundaries.push(new Date(day).toISOString().slice(0, 10));
  }
  return boundaries;
}

export function partitionObjectNames(schema: string, table: string, column: string): { fn: string; scheme: string } {
  const suffix = `${schema}_${table}_${column}`;
  return { fn: `pf_${suffix}`, scheme: `ps_${suffix}` };
}

async function liveKeyDefinition(key: ReflectedNode<'primary_key'>): Promise<IndexDefinition> {
  return {
    name: key.name,
    columns: asNames(await key.getAttribute('columns')),
    clustered: asBoolean(await key.getAttribute('clustered')),
    compression: asText(await key.getAttribute('compression')) ?? 'NONE',
    unique: true,
    includedColumns: [],
  };
}

async function liveIndexDefinition(index: ReflectedNode<'index'>): Promise<IndexDefinition> {
  return {
    name: index.name,
    columns: asNames(await index.getAttribute('columns')),
    clustered: asBoolean(await index.getAttribute('clustered')),
    compression: asText(await index.getAttribute('compression')) ?? 'NONE',
    unique: asBoolean(await index.getAttribute('unique')),
    includedColumns: asNames(await index.getAttribute('included_columns')),
  };
}

/**
 * Rebuild every key and index of the table on the given storage, clustered
 * first.
 */
async function moveIndexes(table: ReflectedNode<'table'>, placement: IndexPlacement): Promise<void> {
  const { schema } = tableOf(table);
  const definitions: IndexDefinition[] = [];
  for (const key of await table.listChildren('primary_key')) {
    definitions.push(await liveKeyDefinition(key));
  }
  for (const index of await table.listChildren('index')) {
    definitions.push(await liveIndexDefinition(index));
  }
  const ordered = [...definitions.filter((d) => d.clustered), ...definitions.filter((d) => !d.clustered)];
  for (const definition of ordered) {
    await table.execute(
      table.context.dialect.createIndex(schema, table.name, definition, { dropExisting: true, placement })
    );
  }
}

export const partitionBehavior: EntityBehavior<'partition'> = {
  type: 'partition',
  systemNames: [],
  creatable: true,

  async listNames(parent) {
    const { schema, table } = tableOf(parent);
    return listNamesOf(parent, parent.context.dialect.listPartitions(schema, table), 'ps_name');
  },

  async nameExists(parent, name) {
    const { schema, table } = tableOf(parent);
    return parent.exists(parent.context.dialect.partitionExists(schema, table, name));
  },

  async fromDeclared(parent, declared) {
    const { schema, table } = tableOf(parent);
    const column = asText(declared.attribute('column')) ?? declared.name;
    const row = await parent.firstRow(parent.context.dialect.partitionForColumn(schema, table, column));
    return textField(row, 'ps_name');
  },

  async matches(node, declared) {
    const live = asText(await node.getAttribute('column'));
    const wanted = asText(declared.attribute('column'));
    return live !== null && wanted !== null && live.toLowerCase() === wanted.toLowerCase();
  },

  async create(parent, declared) {
    const { dialect, driver, now } = parent.context;
    const table = parent.requireAncestor('table');
    const { schema } = tableOf(table);
    const columnName = asText(declared.attribute('column')) ?? declared.name;

    const column = await table.getChild('column', columnName);
    if (!column) {
      throw new ObjectNotFoundError(table.fullName(), `Column "${columnName}"`);
    }
    const definition = await liveColumnDefinition(column);
    if (!PARTITIONABLE_TYPES.has(definition.dataType)) {
      throw new OperationRefusedError(
        column.fullName(),
        `Partition column must be datetime or datetime2, not ${definition.dataType}`,
        false
      );
    }

    const range = await table.firstRow(dialect.columnRange(schema, table.name, columnName));
    const first = dateField(range, 'min_value') ?? now();
    const last = dateField(range, 'max_value') ?? now();
    const names = partitionObjectNames(schema, table.name, columnName);

    await table.execute(dialect.createPartitionFunction(names.fn, definition, dailyBoundaries(first, last)));
    await table.execute(dialect.createPartitionScheme(names.scheme, names.fn));
    await driver.commit();
    await moveIndexes(table, { scheme: names.scheme, column: columnName });
  },

  async fetchDetail(node) {
    const { schema, table } = tableOf(node);
    return node.firstRow(node.context.dialect.partitionDetail(schema, table, node.name));
  },

  readers: {
    async column(_node, detail) {
      return textField(detail, 'column_name')?.toLowerCase() ?? null;
    },
  },

  async remove(node) {
    const { dialect, driver } = node.context;
    const functionName = textField(await node.getDetail(), 'pf_name');
    await moveIndexes(node.requireAncestor('table'), 'primary');
    await driver.commit();
    await node.execute(dialect.dropPartitionScheme(node.name));
    if (functionName) {
      await node.execute(dialect.dropPartitionFunction(functionName));
    }
    return APPLIED;
  },
};
