/**
 * Validate Command
 *
 * Checks a declared schema file without connecting to a server.
 *
 * @module packages/cli/commands/validate
 */

import chalk from 'chalk';
import { childTypesOf, ENTITY_LABELS, ENTITY_TYPES, type DeclaredNode, type EntityType } from '@dbconverge/core/domain';
import { loadDeclaredServer } from './schema/index.js';
import { printWarnings } from './utils.js';

export interface ValidateCommandOptions {
  file: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Number of declared objects per type below the root, in tree order
 */
export function countDeclared(root: DeclaredNode): Partial<Record<EntityType, number>> {
  const counts: Partial<Record<EntityType, number>> = {};
  const visit = (node: DeclaredNode): void => {
    for (const type of childTypesOf(node.type)) {
      for (const child of node.getChildren(type)) {
        counts[type] = (counts[type] ?? 0) + 1;
        visit(child);
      }
    }
  };
  visit(root);
  return counts;
}

export async function validateCommand(options: ValidateCommandOptions): Promise<void> {
  const { declared, warnings, sourcePath } = loadDeclaredServer(options.file);
  const counts = countDeclared(declared);

  if (options.json) {
    console.log(JSON.stringify({ success: true, file: sourcePath, objects: counts, warnings }, null, 2));
    return;
  }

  printWarnings(warnings, options);
  if (options.quiet) {
    return;
  }
  console.log(chalk.green(`✓ ${options.file} is valid`));
  for (const type of ENTITY_TYPES) {
    const count = counts[type];
    if (count !== undefined) {
      console.log(chalk.dim(`  ${count} × ${ENTITY_LABELS[type]}`));
    }
  }
}
