/**
 * Column behavior
 *
 * Column names are listed lower-cased. Type and identity changes first drop
 * the keys and indexes that use the column; the engine recreates them when it
 * reaches the table's key and index children.
 *
 * @module packages/reconciler/reflected/behaviors/column
 */

import {
  asNames,
  carriesCharLength,
  carriesDatetimePrecision,
  carriesNumericPrecision,
  carriesNumericScale,
  type AttributeValue,
} from '@dbconverge/core/domain';
import type { Row } from '@dbconverge/core/ports';
import { APPLIED, skipped, type MutationResult } from '../../types.js';
import type { AttributeSetter, EntityBehavior } from '../EntityBehavior.js';
import type { ReflectedNode } from '../ReflectedNode.js';
import { numberField, textField } from '../rows.js';
import { columnDefinition, listNamesOf, tableOf } from './shared.js';

function usesColumn(columns: AttributeValue, column: string): boolean {
  return asNames(columns).some((name) => name.toLowerCase() === column.toLowerCase());
}

/**
 * Delete every key and index of the column's table that uses the column.
 */
async function dropDependentIndexes(node: ReflectedNode<'column'>): Promise<MutationResult> {
  const table = node.requireAncestor('table');
  const dependents: ReflectedNode[] = [];

  for (const key of await table.listChildren('primary_key')) {
    if (usesColumn(await key.getAttribute('columns'), node.name)) {
      dependents.push(key);
    }
  }
  for (const index of await table.listChildren('index')) {
    if (
      usesColumn(await index.getAttribute('columns'), node.name) ||
      usesColumn(await index.getAttribute('included_columns'), node.name)
    ) {
      dependents.push(index);
    }
  }

  for (const dependent of dependents) {
    if (!(await dependent.delete())) {
      return skipped(`${dependent.describe()} depends on the column and was not dropped`);
    }
  }
  return APPLIED;
}

const alterColumn: AttributeSetter<'column'> = async (node, declared) => {
  const { schema, table } = tableOf(node);
  await node.execute(node.context.dialect.alterColumn(schema, table, columnDefinition(declared)));
  return APPLIED;
};

function categoryReader(carries: (dataType: string) => boolean, field: string) {
  return async (_node: ReflectedNode<'column'>, detail: Row): Promise<AttributeValue> =>
    carries(textField(detail, 'data_type') ?? '') ? numberField(detail, field) : null;
}

export const columnBehavior: EntityBehavior<'column'> = {
  type: 'column',
  systemNames: [],
  creatable: true,

  async listNames(parent) {
    const { schema, table } = tableOf(parent);
    const names = await listNamesOf(parent, parent.context.dialect.listColumns(schema, table));
    return names.map((name) => name.toLowerCase());
  },

  async nameExists(parent, name) {
    const { schema, table } = tableOf(parent);
    return parent.exists(parent.context.dialect.columnExists(schema, table, name));
  },

  async create(parent, declared) {
    const { schema, table } = tableOf(parent);
    await parent.execute(parent.context.dialect.addColumn(schema, table, columnDefinition(declared)));
  },

  async fetchDetail(node) {
    const { schema, table } = tableOf(node);
    return node.firstRow(node.context.dialect.columnDetail(schema, table, node.name));
  },

  readers: {
    async data_type(_node, detail) {
      return textField(detail, 'data_type')?.toLowerCase() ?? null;
    },
    char_max_len: categoryReader(carriesCharLength, 'char_max_len'),
    datetime_precision: categoryReader(carriesDatetimePrecision, 'datetime_precision'),
    numeric_precision: categoryReader(carriesNumericPrecision, 'numeric_precision'),
    numeric_scale: categoryReader(carriesNumericScale, 'numeric_scale'),
  },

  setters: {
    async data_type(node, declared) {
      const dropped = await dropDependentIndexes(node);
      if (dropped.status === 'skipped') {
        return dropped;
      }
      return alterColumn(node, declared);
    },

    async identity(node, declared) {
      const { dialect } = node.context;
      const { schema, table } = tableOf(node);
      const keyColumns = await node.execute(dialect.primaryKeyColumns(schema, table));
      if (keyColumns.length > 0) {
        return skipped('Identity cannot change on a table with a primary key');
      }
      const dropped = await dropDependentIndexes(node);
      if (dropped.status === 'skipped') {
        return dropped;
      }
      await node.execute(dialect.dropColumn(schema, table, node.name));
      await node.execute(dialect.addColumn(schema, table, columnDefinition(declared)));
      return APPLIED;
    },

    char_max_len: alterColumn,
    datetime_precision: alterColumn,
    numeric_precision: alterColumn,
    numeric_scale: alterColumn,
    nullable: alterColumn,
  },

  async rename(node, newName) {
    const { schema, table } = tableOf(node);
    await node.execute(node.context.dialect.renameColumn(schema, table, node.name, newName));
  },

  async remove(node) {
    const dropped = await dropDependentIndexes(node);
    if (dropped.status === 'skipped') {
      return dropped;
    }
    const { schema, table } = tableOf(node);
    await node.execute(node.context.dialect.dropColumn(schema, table, node.name));
    return APPLIED;
  },
};
