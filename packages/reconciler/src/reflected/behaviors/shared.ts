/**
 * Helpers shared by the behavior tables
 *
 * @module packages/reconciler/reflected/behaviors/shared
 */

import {
  asBoolean,
  asInteger,
  asNames,
  asText,
  type AttributeValue,
  type DeclaredNode,
} from '@dbconverge/core/domain';
import type {
  ColumnDefinition,
  IndexDefinition,
  IndexPlacement,
  PrimaryKeyDefinition,
  SqlStatement,
} from '@dbconverge/core/ports';
import type { ReflectedNode } from '../ReflectedNode.js';
import { textColumn, textField } from '../rows.js';

/** Statements about a database itself run from master */
export const MASTER = { database: 'master' } as const;

export interface TableRef {
  readonly schema: string;
  readonly table: string;
}

/**
 * Schema and table names of a table or of one of its children
 */
export function tableOf(node: ReflectedNode): TableRef {
  const table = node.requireAncestor('table');
  return { schema: table.requireAncestor('schema').name, table: table.name };
}

export async function listNamesOf(parent: ReflectedNode, statement: SqlStatement, field = 'name'): Promise<string[]> {
  return textColumn(await parent.execute(statement), field);
}

export function sameText(a: string | null, b: string | null): boolean {
  return a !== null && b !== null && a.toLowerCase() === b.toLowerCase();
}

/**
 * Names to add and drop to move a live membership set to the declared one
 */
export function membershipChanges(
  declared: AttributeValue,
  current: AttributeValue
): { add: string[]; drop: string[] } {
  const wanted = asNames(declared);
  const live = asNames(current);
  const has = (names: string[], name: string) => names.some((candidate) => sameText(candidate, name));
  return {
    add: wanted.filter((name) => !has(live, name)),
    drop: live.filter((name) => !has(wanted, name)),
  };
}

// =============================================================================
// Definitions
// =============================================================================

export function columnDefinition(declared: DeclaredNode<'column'>): ColumnDefinition {
  return {
    name: declared.name,
    dataType: asText(declared.attribute('data_type')) ?? '',
    charMaxLen: asInteger(declared.attribute('char_max_len')),
    datetimePrecision: asInteger(declared.attribute('datetime_precision')),
    numericPrecision: asInteger(declared.attribute('numeric_precision')),
    numericScale: asInteger(declared.attribute('numeric_scale')),
    nullable: asBoolean(declared.attribute('nullable')),
    identity: asBoolean(declared.attribute('identity')),
  };
}

export async function liveColumnDefinition(column: ReflectedNode<'column'>): Promise<ColumnDefinition> {
  return {
    name: column.name,
    dataType: (asText(await column.getAttribute('data_type')) ?? '').toLowerCase(),
    charMaxLen: asInteger(await column.getAttribute('char_max_len')),
    datetimePrecision: asInteger(await column.getAttribute('datetime_precision')),
    numericPrecision: asInteger(await column.getAttribute('numeric_precision')),
    numericScale: asInteger(await column.getAttribute('numeric_scale')),
    nullable: asBoolean(await column.getAttribute('nullable')),
    identity: asBoolean(await column.getAttribute('identity')),
  };
}

export function primaryKeyDefinition(declared: DeclaredNode<'primary_key'>): PrimaryKeyDefinition {
  return {
    name: declared.name,
    columns: asNames(declared.attribute('columns')),
    clustered: asBoolean(declared.attribute('clustered')),
    compression: asText(declared.attribute('compression')) ?? 'NONE',
  };
}

export function indexDefinition(declared: DeclaredNode<'index'>): IndexDefinition {
  return {
    name: declared.name,
    columns: asNames(declared.attribute('columns')),
    clustered: asBoolean(declared.attribute('clustered')),
    compression: asText(declared.attribute('compression')) ?? 'NONE',
    unique: asBoolean(declared.attribute('unique')),
    includedColumns: asNames(declared.attribute('included_columns')),
  };
}

/**
 * Current storage of a table's indexes: its partition scheme, if any
 */
export async function placementOf(table: ReflectedNode<'table'>): Promise<IndexPlacement> {
  const [partition] = await table.listChildren('partition');
  if (!partition) {
    return 'primary';
  }
  const detail = await partition.getDetail();
  const scheme = textField(detail, 'ps_name');
  const column = textField(detail, 'column_name');
  return scheme && column ? { scheme, column } : 'primary';
}
