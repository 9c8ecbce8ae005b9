/**
 * Align Command
 *
 * Converges the connected server toward the declared schema file. Each change
 * is confirmed on the terminal unless --auto-approve is given.
 *
 * @module packages/cli/commands/align
 */

import { autoApprove } from '@dbconverge/core/ports';
import type { AlignReport } from '@dbconverge/reconciler';
import { formatReport } from './formatters.js';
import { TerminalConfirmation } from './prompt.js';
import { loadDeclaredServer } from './schema/index.js';
import { openSession } from './session.js';
import { printWarnings } from './utils.js';

export interface AlignCommandOptions {
  file: string;
  connection?: string;
  autoApprove?: boolean;
  json?: boolean;
  quiet?: boolean;
}

export async function alignCommand(options: AlignCommandOptions): Promise<AlignReport> {
  const { declared, warnings } = loadDeclaredServer(options.file);
  printWarnings(warnings, options);

  const confirm = options.autoApprove ? autoApprove : new TerminalConfirmation();
  const session = await openSession(options, confirm);
  try {
    const report = await session.engine.align(declared, session.root);

    if (options.json) {
      console.log(JSON.stringify({ success: true, server: session.root.name, ...report }, null, 2));
    } else if (!options.quiet) {
      console.log(formatReport(report));
    }
    return report;
  } finally {
    await session.close();
  }
}
