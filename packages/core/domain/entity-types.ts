/**
 * Entity Types
 *
 * The closed set of database object kinds the reconciler manages, and the
 * parent/child shape both the declared and the reflected trees follow.
 *
 * @module packages/core/domain/entity-types
 */

// =============================================================================
// Entity Types
// =============================================================================

export const ENTITY_TYPES = [
  'server',
  'login',
  'database',
  'schema',
  'user',
  'table',
  'column',
  'primary_key',
  'index',
  'partition',
  'foreign_key',
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/**
 * Allowed child types per entity type, in alignment order.
 *
 * Columns come before keys and indexes so those can reference them; foreign
 * keys come last so the primary keys they point at already exist.
 */
export const CHILD_TYPES = {
  server: ['login', 'database'],
  login: [],
  database: ['schema', 'user'],
  schema: ['table'],
  user: [],
  table: ['column', 'primary_key', 'index', 'partition', 'foreign_key'],
  column: [],
  primary_key: [],
  index: [],
  partition: [],
  foreign_key: [],
} as const satisfies { readonly [T in EntityType]: readonly EntityType[] };

export type ChildTypeOf<T extends EntityType> = (typeof CHILD_TYPES)[T][number];

/**
 * Child types a parent may hold at most one of.
 */
export const SINGLETON_CHILD_TYPES: ReadonlySet<EntityType> = new Set<EntityType>([
  'primary_key',
  'partition',
]);

/**
 * Human readable labels used in log lines and error messages.
 */
export const ENTITY_LABELS: { readonly [T in EntityType]: string } = {
  server: 'Server',
  login: 'Login',
  database: 'Database',
  schema: 'Schema',
  user: 'User',
  table: 'Table',
  column: 'Column',
  primary_key: 'PrimaryKey',
  index: 'Index',
  partition: 'Partition',
  foreign_key: 'ForeignKey',
};

// =============================================================================
// Helpers
// =============================================================================

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((type) => type === value);
}

export function childTypesOf(type: EntityType): readonly EntityType[] {
  return CHILD_TYPES[type];
}

export function isChildTypeOf<T extends EntityType>(
  parentType: T,
  childType: EntityType
): childType is ChildTypeOf<T> {
  return childTypesOf(parentType).includes(childType);
}
