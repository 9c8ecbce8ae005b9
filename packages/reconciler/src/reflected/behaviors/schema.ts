import type { EntityBehavior } from '../EntityBehavior.js';
import { listNamesOf } from './shared.js';

/**
 * Schemas are created on demand. Rename has no remediation and deletion is
 * refused.
 */
export const schemaBehavior: EntityBehavior<'schema'> = {
  type: 'schema',
  systemNames: ['sys', 'guest', 'INFORMATION_SCHEMA'],
  creatable: true,

  async listNames(parent) {
    return listNamesOf(parent, parent.context.dialect.listSchemas());
  },

  async nameExists(parent, name) {
    return parent.exists(parent.context.dialect.schemaExists(name));
  },

  async create(parent, declared) {
    await parent.execute(parent.context.dialect.createSchema(declared.name));
  },

  async fetchDetail(node) {
    return node.firstRow(node.context.dialect.schemaDetail(node.name));
  },

  deleteRefusal() {
    return 'Schema deletion is not supported';
  },
};
