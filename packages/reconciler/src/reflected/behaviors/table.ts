import { APPLIED } from '../../types.js';
import type { EntityBehavior } from '../EntityBehavior.js';
import { columnDefinition, listNamesOf } from './shared.js';

/**
 * Tables are created with their declared columns; keys, indexes, partition
 * and foreign keys follow as children.
 */
export const tableBehavior: EntityBehavior<'table'> = {
  type: 'table',
  systemNames: [],
  creatable: true,

  async listNames(parent) {
    return listNamesOf(parent, parent.context.dialect.listTables(parent.name));
  },

  async nameExists(parent, name) {
    return parent.exists(parent.context.dialect.tableExists(parent.name, name));
  },

  async create(parent, declared) {
    const columns = declared.getChildren('column').map(columnDefinition);
    await parent.execute(parent.context.dialect.createTable(parent.name, declared.name, columns));
  },

  async fetchDetail(node) {
    return node.firstRow(node.context.dialect.tableDetail(node.requireAncestor('schema').name, node.name));
  },

  async rename(node, newName) {
    await node.execute(node.context.dialect.renameTable(node.requireAncestor('schema').name, node.name, newName));
  },

  async remove(node) {
    await node.execute(node.context.dialect.dropTable(node.requireAncestor('schema').name, node.name));
    return APPLIED;
  },
};
