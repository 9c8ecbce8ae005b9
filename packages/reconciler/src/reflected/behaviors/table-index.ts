/**
 * Index behavior
 *
 * A declared index matches the first live index with the same ordered key
 * columns. Changes that alter the index structure rebuild it in place on its
 * current storage.
 *
 * @module packages/reconciler/reflected/behaviors/table-index
 */

import { asText } from '@dbconverge/core/domain';
import { APPLIED } from '../../types.js';
import type { AttributeSetter, EntityBehavior } from '../EntityBehavior.js';
import { flagField } from '../rows.js';
import {
  fetchIndexDetail,
  readClustered,
  readIncludedColumns,
  readKeyColumns,
  sameColumns,
} from './index-common.js';
import { indexDefinition, listNamesOf, placementOf, tableOf } from './shared.js';

const recreate: AttributeSetter<'index'> = async (node, declared) => {
  const { schema, table } = tableOf(node);
  const placement = await placementOf(node.requireAncestor('table'));
  await node.execute(
    node.context.dialect.createIndex(
      schema,
      table,
      { ...indexDefinition(declared), name: node.name },
      { dropExisting: true, placement }
    )
  );
  return APPLIED;
};

export const indexBehavior: EntityBehavior<'index'> = {
  type: 'index',
  systemNames: [],
  creatable: true,

  async listNames(parent) {
    const { schema, table } = tableOf(parent);
    return listNamesOf(parent, parent.context.dialect.listIndexes(schema, table));
  },

  async nameExists(parent, name) {
    const { schema, table } = tableOf(parent);
    return parent.exists(parent.context.dialect.indexExists(schema, table, name));
  },

  async fromDeclared(parent, declared) {
    for (const index of await parent.listChildren('index')) {
      if (sameColumns(await index.getAttribute('columns'), declared.attribute('columns'))) {
        return index.name;
      }
    }
    return null;
  },

  async matches(node, declared) {
    return sameColumns(await node.getAttribute('columns'), declared.attribute('columns'));
  },

  async create(parent, declared) {
    const { schema, table } = tableOf(parent);
    const placement = await placementOf(parent.requireAncestor('table'));
    await parent.execute(
      parent.context.dialect.createIndex(schema, table, indexDefinition(declared), { dropExisting: false, placement })
    );
  },

  fetchDetail: fetchIndexDetail,

  readers: {
    columns: readKeyColumns,
    clustered: readClustered,
    included_columns: readIncludedColumns,
  },

  setters: {
    clustered: recreate,
    included_columns: recreate,
    unique: recreate,

    async compression(node, declared) {
      const { schema, table } = tableOf(node);
      const compression = asText(declared.attribute('compression')) ?? 'NONE';
      await node.execute(node.context.dialect.rebuildIndex(schema, table, node.name, compression));
      return APPLIED;
    },
  },

  async rename(node, newName) {
    const { schema, table } = tableOf(node);
    await node.execute(node.context.dialect.renameIndex(schema, table, node.name, newName));
  },

  async remove(node) {
    const { schema, table } = tableOf(node);
    const { dialect } = node.context;
    const detail = await node.getDetail();
    const statement = flagField(detail, 'is_unique_constraint')
      ? dialect.dropConstraint(schema, table, node.name)
      : dialect.dropIndex(schema, table, node.name);
    await node.execute(statement);
    return APPLIED;
  },
};
