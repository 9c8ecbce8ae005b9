/**
 * Row field accessors
 *
 * Driver rows are untyped records; these read one field as the type the
 * caller expects.
 *
 * @module packages/reconciler/reflected/rows
 */

import type { Row } from '@dbconverge/core/ports';

export function textField(row: Row | undefined, name: string): string | null {
  const value = row?.[name];
  if (value === null || value === undefined) {
    return null;
  }
  return typeof value === 'string' ? value : String(value);
}

export function numberField(row: Row | undefined, name: string): number | null {
  const value = row?.[name];
  if (value === null || value === undefined) {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Bit columns arrive as booleans or 0/1 */
export function flagField(row: Row | undefined, name: string): boolean {
  const value = row?.[name];
  return value === true || value === 1;
}

export function dateField(row: Row | undefined, name: string): Date | null {
  const value = row?.[name];
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

/**
 * Non-null values of one text field across rows, in row order
 */
export function textColumn(rows: readonly Row[], name: string): string[] {
  return rows.map((row) => textField(row, name)).filter((value): value is string => value !== null);
}
