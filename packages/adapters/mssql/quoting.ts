/**
 * T-SQL quoting
 *
 * Identifiers are bracket-quoted; the few literals DDL cannot bind as
 * parameters (file names, partition boundaries) are N-quoted.
 *
 * @module packages/adapters/mssql/quoting
 */

import { DeclarationError, ErrorCodes } from '@dbconverge/core/domain';

export function quoteName(name: string): string {
  return `[${name.replace(/]/g, ']]')}]`;
}

/** `[schema].[object]`, optionally followed by a member such as a column or index */
export function qualifiedName(...parts: string[]): string {
  return parts.map(quoteName).join('.');
}

export function quoteLiteral(value: string): string {
  return `N'${value.replace(/'/g, "''")}'`;
}

/**
 * Keyword from a closed set, upper-cased
 *
 * @throws DeclarationError for anything outside the set
 */
export function keyword<K extends string>(value: string, allowed: readonly K[], what: string): K {
  const upper = value.toUpperCase();
  const match = allowed.find((candidate) => candidate === upper);
  if (match === undefined) {
    throw new DeclarationError(`Invalid ${what}: ${value}`, {
      code: ErrorCodes.DECLARATION_INVALID_VALUE,
      suggestion: `Use one of ${allowed.join(', ')}.`,
    });
  }
  return match;
}
