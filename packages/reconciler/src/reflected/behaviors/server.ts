import type { EntityBehavior } from '../EntityBehavior.js';

/**
 * The server is the root: it is never listed, created, renamed or deleted.
 */
export const serverBehavior: EntityBehavior<'server'> = {
  type: 'server',
  systemNames: [],
  creatable: false,

  async listNames() {
    return [];
  },

  async nameExists() {
    return false;
  },

  async fetchDetail(node) {
    return node.firstRow(node.context.dialect.serverName());
  },
};
