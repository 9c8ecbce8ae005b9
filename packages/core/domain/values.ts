/**
 * Attribute Value Semantics
 *
 * One canonical equality rule per attribute kind, plus coercion of raw driver
 * values (bit columns, decimals, nulls) into attribute values.
 *
 * @module packages/core/domain/values
 */

import type { AttributeKind, AttributeSpec, AttributeValue } from './attributes.js';

// =============================================================================
// Equality
// =============================================================================

function foldCase(value: string): string {
  return value.toLowerCase();
}

function normalizePath(value: string): string {
  return value.replace(/\//g, '\\').toLowerCase();
}

function isStringList(value: AttributeValue): value is readonly string[] {
  return Array.isArray(value);
}

function isStringSet(value: AttributeValue): value is ReadonlySet<string> {
  return value instanceof Set;
}

function toFoldedSet(value: AttributeValue): Set<string> | null {
  if (value === null) {
    return new Set();
  }
  if (isStringSet(value) || isStringList(value)) {
    return new Set([...value].map(foldCase));
  }
  return null;
}

/**
 * Compare a declared value with a reflected value under the attribute's rule.
 *
 * A declared `null` on an optional attribute means "not managed" and matches
 * anything the live server reports.
 */
export function attributeEquals(
  spec: AttributeSpec,
  declared: AttributeValue,
  reflected: AttributeValue
): boolean {
  if (declared === null && spec.optional) {
    return true;
  }
  return valuesEqual(spec.kind, declared, reflected);
}

export function valuesEqual(kind: AttributeKind, a: AttributeValue, b: AttributeValue): boolean {
  switch (kind) {
    case 'set': {
      const left = toFoldedSet(a);
      const right = toFoldedSet(b);
      if (left === null || right === null) {
        return false;
      }
      return left.size === right.size && [...left].every((item) => right.has(item));
    }
    case 'ordered': {
      if (!isStringList(a) || !isStringList(b)) {
        return a === null && b === null;
      }
      return a.length === b.length && a.every((item, i) => foldCase(item) === foldCase(b[i] ?? ''));
    }
    case 'text':
      if (typeof a === 'string' && typeof b === 'string') {
        return foldCase(a) === foldCase(b);
      }
      return a === b;
    case 'path':
      if (typeof a === 'string' && typeof b === 'string') {
        return normalizePath(a) === normalizePath(b);
      }
      return a === b;
    case 'integer':
    case 'boolean':
      return a === b;
  }
}

// =============================================================================
// Coercion
// =============================================================================

function toNameList(raw: unknown): string[] | null {
  if (Array.isArray(raw)) {
    return raw.map((item) => String(item).toLowerCase());
  }
  if (raw instanceof Set) {
    return [...raw].map((item) => String(item).toLowerCase());
  }
  if (typeof raw === 'string') {
    return raw
      .split(',')
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item.length > 0);
  }
  return null;
}

/**
 * Coerce a raw row field into an attribute value of the given kind.
 *
 * Returns `undefined` when the raw value cannot represent the kind, so the
 * caller can raise with entity context.
 */
export function coerceAttributeValue(kind: AttributeKind, raw: unknown): AttributeValue | undefined {
  if (raw === null || raw === undefined) {
    return null;
  }
  switch (kind) {
    case 'text':
    case 'path':
      return typeof raw === 'string' ? raw : String(raw);
    case 'integer': {
      const value = typeof raw === 'number' ? raw : Number(raw);
      return Number.isFinite(value) ? Math.trunc(value) : undefined;
    }
    case 'boolean':
      if (typeof raw === 'boolean') {
        return raw;
      }
      if (typeof raw === 'number') {
        return raw !== 0;
      }
      return undefined;
    case 'ordered':
      return toNameList(raw) ?? undefined;
    case 'set': {
      const names = toNameList(raw);
      return names === null ? undefined : new Set(names);
    }
  }
}

/**
 * Render a value for log lines and change descriptions.
 */
export function formatAttributeValue(value: AttributeValue): string {
  if (value === null) {
    return 'null';
  }
  if (isStringSet(value)) {
    return `{${[...value].sort().join(', ')}}`;
  }
  if (isStringList(value)) {
    return `(${value.join(', ')})`;
  }
  return typeof value === 'string' ? `"${value}"` : String(value);
}

// =============================================================================
// Narrowing
// =============================================================================

export function asText(value: AttributeValue): string | null {
  return typeof value === 'string' ? value : null;
}

export function asInteger(value: AttributeValue): number | null {
  return typeof value === 'number' ? value : null;
}

export function asBoolean(value: AttributeValue): boolean {
  return value === true;
}

/**
 * Names held by an ordered or set value, in order; `null` yields none.
 */
export function asNames(value: AttributeValue): string[] {
  if (isStringSet(value) || isStringList(value)) {
    return [...value];
  }
  return [];
}
