/**
 * Behavior tables by entity type
 *
 * @module packages/reconciler/reflected/behaviors
 */

import type { EntityType } from '@dbconverge/core/domain';
import type { EntityBehavior } from '../EntityBehavior.js';
import { columnBehavior } from './column.js';
import { databaseBehavior } from './database.js';
import { foreignKeyBehavior } from './foreign-key.js';
import { loginBehavior } from './login.js';
import { partitionBehavior } from './partition.js';
import { primaryKeyBehavior } from './primary-key.js';
import { schemaBehavior } from './schema.js';
import { serverBehavior } from './server.js';
import { tableBehavior } from './table.js';
import { indexBehavior } from './table-index.js';
import { userBehavior } from './user.js';

export const BEHAVIORS: { readonly [T in EntityType]: EntityBehavior<T> } = {
  server: serverBehavior,
  login: loginBehavior,
  database: databaseBehavior,
  schema: schemaBehavior,
  user: userBehavior,
  table: tableBehavior,
  column: columnBehavior,
  primary_key: primaryKeyBehavior,
  index: indexBehavior,
  partition: partitionBehavior,
  foreign_key: foreignKeyBehavior,
};

export function behaviorOf<T extends EntityType>(type: T): EntityBehavior<T> {
  return BEHAVIORS[type];
}

export { SERVER_ROLES } from './login.js';
export { dailyBoundaries, partitionObjectNames } from './partition.js';
