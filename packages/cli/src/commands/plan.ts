/**
 * Plan Command
 *
 * Dry run: every change the engine would make is declined and listed.
 * Nothing is created, altered or dropped.
 *
 * @module packages/cli/commands/plan
 */

import { PlanRecorder } from '@dbconverge/core/ports';
import { formatPlan } from './formatters.js';
import { loadDeclaredServer } from './schema/index.js';
import { printWarnings } from './utils.js';
import { openSession } from './session.js';

export interface PlanCommandOptions {
  file: string;
  connection?: string;
  json?: boolean;
  quiet?: boolean;
}

export async function planCommand(options: PlanCommandOptions): Promise<readonly string[]> {
  const { declared, warnings } = loadDeclaredServer(options.file);
  printWarnings(warnings, options);

  const recorder = new PlanRecorder();
  const session = await openSession(options, recorder);
  try {
    await session.engine.align(declared, session.root);

    if (options.json) {
      console.log(
        JSON.stringify({ success: true, server: session.root.name, planned: recorder.planned }, null, 2)
      );
    } else {
      console.log(formatPlan(recorder.planned));
    }
    return recorder.planned;
  } finally {
    await session.close();
  }
}
