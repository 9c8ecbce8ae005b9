/**
 * Attribute Registry
 *
 * Static mapping from entity type to the ordered attribute names that are
 * compared between declared and reflected state and that may be altered.
 * Each attribute carries a kind which selects its equality rule.
 *
 * @module packages/core/domain/attributes
 */

import type { EntityType } from './entity-types.js';

// =============================================================================
// Attribute Values
// =============================================================================

/**
 * Kind of an attribute value, selecting how it is coerced and compared.
 *
 * - `text`: case-insensitive string
 * - `path`: case-insensitive file path, `/` and `\` interchangeable
 * - `integer` / `boolean`: scalar
 * - `ordered`: ordered list of names (index key columns)
 * - `set`: unordered set of names (roles, included columns)
 */
export type AttributeKind = 'text' | 'path' | 'integer' | 'boolean' | 'ordered' | 'set';

export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | readonly string[]
  | ReadonlySet<string>;

export interface AttributeSpec {
  readonly name: string;
  readonly kind: AttributeKind;
  /** A declared `null` means the attribute is not managed. */
  readonly optional?: boolean;
}

// =============================================================================
// Registry
// =============================================================================

export const ATTRIBUTE_REGISTRY = {
  server: [],
  login: [
    { name: 'type_desc', kind: 'text' },
    { name: 'server_roles', kind: 'set' },
  ],
  database: [
    { name: 'recovery_model_desc', kind: 'text' },
    { name: 'data_size', kind: 'integer', optional: true },
    { name: 'log_size', kind: 'integer', optional: true },
    { name: 'owner', kind: 'text' },
    { name: 'data_file_path', kind: 'path', optional: true },
    { name: 'log_file_path', kind: 'path', optional: true },
  ],
  schema: [],
  user: [
    { name: 'login_name', kind: 'text' },
    { name: 'db_roles', kind: 'set' },
  ],
  table: [],
  column: [
    { name: 'data_type', kind: 'text' },
    { name: 'char_max_len', kind: 'integer' },
    { name: 'datetime_precision', kind: 'integer' },
    { name: 'numeric_precision', kind: 'integer' },
    { name: 'numeric_scale', kind: 'integer' },
    { name: 'nullable', kind: 'boolean' },
    { name: 'identity', kind: 'boolean' },
  ],
  primary_key: [
    { name: 'columns', kind: 'ordered' },
    { name: 'clustered', kind: 'boolean' },
    { name: 'compression', kind: 'text' },
  ],
  index: [
    { name: 'columns', kind: 'ordered' },
    { name: 'clustered', kind: 'boolean' },
    { name: 'compression', kind: 'text' },
    { name: 'included_columns', kind: 'set' },
    { name: 'unique', kind: 'boolean' },
  ],
  partition: [{ name: 'column', kind: 'text' }],
  foreign_key: [
    { name: 'foreign_schema', kind: 'text' },
    { name: 'foreign_table', kind: 'text' },
    { name: 'foreign_column', kind: 'text' },
    { name: 'column', kind: 'text' },
  ],
} as const satisfies { readonly [T in EntityType]: readonly AttributeSpec[] };

export type AttributeName<T extends EntityType> = (typeof ATTRIBUTE_REGISTRY)[T][number]['name'];

/**
 * Complete attribute value map for an entity type.
 */
export type AttributeValues<T extends EntityType> = { readonly [K in AttributeName<T>]: AttributeValue };

/**
 * Ordered attribute specs for an entity type.
 */
export function attributeSpecs(type: EntityType): readonly AttributeSpec[] {
  return ATTRIBUTE_REGISTRY[type];
}

/**
 * Ordered attribute names for an entity type.
 */
export function attributeNames<T extends EntityType>(type: T): AttributeName<T>[] {
  return attributeSpecs(type)
    .map((spec) => spec.name)
    .filter((name): name is AttributeName<T> => isAttributeName(type, name));
}

export function isAttributeName<T extends EntityType>(type: T, name: string): name is AttributeName<T> {
  return attributeSpecs(type).some((spec) => spec.name === name);
}

/**
 * Look up the spec for one attribute.
 *
 * @throws Error when the attribute is not registered for the type; this is a
 *   programming error, never a runtime condition.
 */
export function attributeSpec(type: EntityType, name: string): AttributeSpec {
  const spec = attributeSpecs(type).find((candidate) => candidate.name === name);
  if (!spec) {
    throw new Error(`Attribute "${name}" is not registered for entity type "${type}"`);
  }
  return spec;
}
