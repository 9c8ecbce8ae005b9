/**
 * Readers and matching shared by primary keys and indexes
 *
 * Both are matched structurally, by their ordered key columns, never by name.
 *
 * @module packages/reconciler/reflected/behaviors/index-common
 */

import { valuesEqual, type AttributeValue } from '@dbconverge/core/domain';
import type { IndexColumnSelection, Row } from '@dbconverge/core/ports';
import type { ReflectedNode } from '../ReflectedNode.js';
import { textColumn, textField } from '../rows.js';
import { tableOf } from './shared.js';

async function indexColumns(node: ReflectedNode, selection: IndexColumnSelection): Promise<string[]> {
  const { schema, table } = tableOf(node);
  const rows = await node.execute(node.context.dialect.indexColumns(schema, table, node.name, selection));
  return textColumn(rows, 'column_name').map((name) => name.toLowerCase());
}

/**
 * Key columns in key order. A partitioned table may key on the partition
 * column alone, which the `key` selection leaves out.
 */
export async function readKeyColumns(node: ReflectedNode): Promise<AttributeValue> {
  const key = await indexColumns(node, 'key');
  return key.length > 0 ? key : indexColumns(node, 'all');
}

export async function readIncludedColumns(node: ReflectedNode): Promise<AttributeValue> {
  const included = await indexColumns(node, 'included');
  return included.length > 0 ? new Set(included) : null;
}

export async function readClustered(_node: ReflectedNode, detail: Row): Promise<AttributeValue> {
  return textField(detail, 'type_desc') === 'CLUSTERED';
}

export async function fetchIndexDetail(node: ReflectedNode): Promise<Row | undefined> {
  const { schema, table } = tableOf(node);
  return node.firstRow(node.context.dialect.indexDetail(schema, table, node.name));
}

export function sameColumns(a: AttributeValue, b: AttributeValue): boolean {
  return valuesEqual('ordered', a, b);
}
