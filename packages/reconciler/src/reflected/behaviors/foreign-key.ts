/**
 * Foreign key behavior
 *
 * Matched by what the constraint references, not by its name.
 *
 * @module packages/reconciler/reflected/behaviors/foreign-key
 */

import { asText, type DeclaredNode } from '@dbconverge/core/domain';
import type { ForeignKeyDefinition } from '@dbconverge/core/ports';
import { APPLIED } from '../../types.js';
import type { EntityBehavior } from '../EntityBehavior.js';
import type { ReflectedNode } from '../ReflectedNode.js';
import { listNamesOf, tableOf } from './shared.js';

const REFERENCE_ATTRIBUTES = ['column', 'foreign_schema', 'foreign_table', 'foreign_column'] as const;

function declaredReference(declared: DeclaredNode<'foreign_key'>): string {
  return REFERENCE_ATTRIBUTES.map((name) => (asText(declared.attribute(name)) ?? '').toLowerCase()).join('|');
}

async function liveReference(node: ReflectedNode<'foreign_key'>): Promise<string> {
  const parts: string[] = [];
  for (const name of REFERENCE_ATTRIBUTES) {
    parts.push((asText(await node.getAttribute(name)) ?? '').toLowerCase());
  }
  return parts.join('|');
}

export const foreignKeyBehavior: EntityBehavior<'foreign_key'> = {
  type: 'foreign_key',
  systemNames: [],
  creatable: true,

  async listNames(parent) {
    const { schema, table } = tableOf(parent);
    return listNamesOf(parent, parent.context.dialect.listForeignKeys(schema, table));
  },

  async nameExists(parent, name) {
    const { schema, table } = tableOf(parent);
    return parent.exists(parent.context.dialect.foreignKeyExists(schema, table, name));
  },

  async fromDeclared(parent, declared) {
    const reference = declaredReference(declared);
    for (const key of await parent.listChildren('foreign_key')) {
      if ((await liveReference(key)) === reference) {
        return key.name;
      }
    }
    return null;
  },

  async matches(node, declared) {
    return (await liveReference(node)) === declaredReference(declared);
  },

  async create(parent, declared) {
    const { schema, table } = tableOf(parent);
    const column = asText(declared.attribute('column')) ?? '';
    const foreignSchema = asText(declared.attribute('foreign_schema')) ?? 'dbo';
    const foreignTable = asText(declared.attribute('foreign_table')) ?? '';
    const definition: ForeignKeyDefinition = {
      name: `FK_${schema}_${table}_${column}_${foreignSchema}_${foreignTable}`,
      column,
      foreignSchema,
      foreignTable,
      foreignColumn: asText(declared.attribute('foreign_column')) ?? '',
    };
    await parent.execute(parent.context.dialect.createForeignKey(schema, table, definition));
  },

  async fetchDetail(node) {
    const { schema, table } = tableOf(node);
    return node.firstRow(node.context.dialect.foreignKeyDetail(schema, table, node.name));
  },

  async remove(node) {
    const { schema, table } = tableOf(node);
    await node.execute(node.context.dialect.dropConstraint(schema, table, node.name));
    return APPLIED;
  },
};
