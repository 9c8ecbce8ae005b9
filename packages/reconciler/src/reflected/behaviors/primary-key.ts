import { asText } from '@dbconverge/core/domain';
import { APPLIED } from '../../types.js';
import type { AttributeSetter, EntityBehavior } from '../EntityBehavior.js';
import {
  fetchIndexDetail,
  readClustered,
  readKeyColumns,
  sameColumns,
} from './index-common.js';
import { listNamesOf, placementOf, primaryKeyDefinition, tableOf } from './shared.js';

const recreate: AttributeSetter<'primary_key'> = async (node, declared) => {
  const { schema, table } = tableOf(node);
  const definition = { ...primaryKeyDefinition(declared), name: node.name, unique: true, includedColumns: [] };
  const placement = await placementOf(node.requireAncestor('table'));
  await node.execute(
    node.context.dialect.createIndex(schema, table, definition, { dropExisting: true, placement })
  );
  return APPLIED;
};

export const primaryKeyBehavior: EntityBehavior<'primary_key'> = {
  type: 'primary_key',
  systemNames: [],
  creatable: true,

  async listNames(parent) {
    const { schema, table } = tableOf(parent);
    return listNamesOf(parent, parent.context.dialect.listPrimaryKeys(schema, table));
  },

  async nameExists(parent, name) {
    const { schema, table } = tableOf(parent);
    return parent.exists(parent.context.dialect.primaryKeyExists(schema, table, name));
  },

  async fromDeclared(parent, declared) {
    for (const key of await parent.listChildren('primary_key')) {
      if (sameColumns(await key.getAttribute('columns'), declared.attribute('columns'))) {
        return key.name;
      }
    }
    return null;
  },

  async matches(node, declared) {
    return sameColumns(await node.getAttribute('columns'), declared.attribute('columns'));
  },

  async create(parent, declared) {
    const { schema, table } = tableOf(parent);
    await parent.execute(parent.context.dialect.createPrimaryKey(schema, table, primaryKeyDefinition(declared)));
  },

  fetchDetail: fetchIndexDetail,

  readers: {
    columns: readKeyColumns,
    clustered: readClustered,
  },

  setters: {
    clustered: recreate,

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
    await node.execute(node.context.dialect.dropConstraint(schema, table, node.name));
    return APPLIED;
  },
};
