/**
 * Login behavior
 *
 * Logins are never created: credentials are provisioned outside the
 * reconciler. Role membership, rename and delete are managed.
 *
 * @module packages/reconciler/reflected/behaviors/login
 */

import { APPLIED } from '../../types.js';
import type { EntityBehavior } from '../EntityBehavior.js';
import { flagField } from '../rows.js';
import { listNamesOf, membershipChanges } from './shared.js';

/** Fixed server roles reported as 0/1 fields of the login detail row */
export const SERVER_ROLES = [
  'sysadmin',
  'securityadmin',
  'serveradmin',
  'setupadmin',
  'processadmin',
  'diskadmin',
  'dbcreator',
  'bulkadmin',
] as const;

export const loginBehavior: EntityBehavior<'login'> = {
  type: 'login',
  systemNames: ['##MS_PolicyTsqlExecutionLogin##', '##MS_PolicyEventProcessingLogin##', 'sa'],
  creatable: false,

  async listNames(parent) {
    return listNamesOf(parent, parent.context.dialect.listLogins());
  },

  async nameExists(parent, name) {
    return parent.exists(parent.context.dialect.loginExists(name));
  },

  async fetchDetail(node) {
    return node.firstRow(node.context.dialect.loginDetail(node.name));
  },

  readers: {
    async server_roles(_node, detail) {
      return new Set(SERVER_ROLES.filter((role) => flagField(detail, role)));
    },
  },

  setters: {
    async server_roles(node, declared) {
      const { dialect } = node.context;
      const { add, drop } = membershipChanges(
        declared.attribute('server_roles'),
        await node.getAttribute('server_roles')
      );
      for (const role of add) {
        await node.execute(dialect.alterServerRole(role, 'ADD', node.name));
      }
      for (const role of drop) {
        await node.execute(dialect.alterServerRole(role, 'DROP', node.name));
      }
      return APPLIED;
    },
  },

  async rename(node, newName) {
    await node.execute(node.context.dialect.renameLogin(node.name, newName));
  },

  async remove(node) {
    await node.execute(node.context.dialect.dropLogin(node.name));
    return APPLIED;
  },
};
