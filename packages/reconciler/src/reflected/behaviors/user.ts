/**
 * User behavior
 *
 * A database user is identified only by the login it maps to: a user renamed
 * on the server still matches its declaration, and a user of the declared
 * name mapped to another login does not.
 *
 * @module packages/reconciler/reflected/behaviors/user
 */

import { asNames, asText } from '@dbconverge/core/domain';
import { APPLIED, skipped } from '../../types.js';
import type { EntityBehavior } from '../EntityBehavior.js';
import { textColumn, textField } from '../rows.js';
import { listNamesOf, membershipChanges, sameText } from './shared.js';

export const userBehavior: EntityBehavior<'user'> = {
  type: 'user',
  systemNames: ['dbo', 'guest', 'sys', 'INFORMATION_SCHEMA'],
  creatable: true,

  async listNames(parent) {
    return listNamesOf(parent, parent.context.dialect.listUsers());
  },

  async nameExists(parent, name) {
    return parent.exists(parent.context.dialect.userExists(name));
  },

  async fromDeclared(parent, declared) {
    const login = asText(declared.attribute('login_name')) ?? declared.name;
    return textField(await parent.firstRow(parent.context.dialect.userForLogin(login)), 'name');
  },

  async matches(node, declared) {
    const login = asText(declared.attribute('login_name')) ?? declared.name;
    return sameText(asText(await node.getAttribute('login_name')), login);
  },

  async create(parent, declared) {
    const { dialect } = parent.context;
    const login = asText(declared.attribute('login_name')) ?? declared.name;
    await parent.execute(dialect.createUser(declared.name, login));
    for (const role of asNames(declared.attribute('db_roles'))) {
      await parent.execute(dialect.alterDatabaseRole(role, 'ADD', declared.name));
    }
  },

  async fetchDetail(node) {
    return node.firstRow(node.context.dialect.userDetail(node.name));
  },

  readers: {
    async db_roles(node) {
      const rows = await node.execute(node.context.dialect.userRoles(node.name));
      return new Set(textColumn(rows, 'role_name').map((role) => role.toLowerCase()));
    },
  },

  setters: {
    async db_roles(node, declared) {
      const { dialect } = node.context;
      const database = node.requireAncestor('database');
      const owner = asText(await database.getAttribute('owner'));
      const login = asText(await node.getAttribute('login_name'));
      if (sameText(owner, login)) {
        return skipped(`Login ${login ?? ''} owns database ${database.name}; its roles cannot change`);
      }

      const { add, drop } = membershipChanges(declared.attribute('db_roles'), await node.getAttribute('db_roles'));
      for (const role of add) {
        await node.execute(dialect.alterDatabaseRole(role, 'ADD', node.name));
      }
      for (const role of drop) {
        await node.execute(dialect.alterDatabaseRole(role, 'DROP', node.name));
      }
      return APPLIED;
    },
  },

  async rename(node, newName) {
    await node.execute(node.context.dialect.renameUser(node.name, newName));
  },

  async remove(node) {
    await node.execute(node.context.dialect.dropUser(node.name));
    return APPLIED;
  },
};
