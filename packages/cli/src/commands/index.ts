/**
 * CLI Commands Registry
 *
 * Registers `validate`, `plan` and `align` with the program. Command modules
 * load on use, so `validate` never loads the database client.
 *
 * @module packages/cli/commands
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { handleError, shouldUseColor } from './utils.js';

const DEFAULT_FILE = 'schema.yaml';

type GlobalOptions = {
  color?: boolean;
  quiet?: boolean;
};

type CommandOptions = {
  file: string;
  connection?: string;
  autoApprove?: boolean;
  json?: boolean;
};

/**
 * Registers all commands with the program
 */
export function registerCommands(program: Command): void {
  program
    // Common options (clig.dev compliance)
    .option('--no-color', 'Disable colored output')
    .option('-q, --quiet', 'Suppress non-essential output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals<GlobalOptions>();
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    })
    .addHelpText(
      'after',
      `
Examples:
  $ dbconverge validate -f schema.yaml        Check a schema file offline
  $ dbconverge plan                           Preview changes (dry-run)
  $ dbconverge align                          Apply changes, confirming each
  $ dbconverge align --auto-approve --json    Apply everything, report as JSON

Environment:
  DBCONVERGE_CONNECTION_STRING               mssql connection string
  LOG_LEVEL                                  pino log level (default: info)
`
    );

  const quiet = (): boolean => program.opts<GlobalOptions>().quiet === true;

  program
    .command('validate')
    .description('Validate a declared schema file without connecting')
    .option('-f, --file <path>', 'Schema file path', DEFAULT_FILE)
    .option('--json', 'Output result as JSON')
    .action(async (options: CommandOptions) => {
      try {
        const { validateCommand } = await import('./validate.js');
        await validateCommand({ ...options, quiet: quiet() });
      } catch (error) {
        handleError(error, options.json);
      }
    });

  program
    .command('plan')
    .description('Preview the changes align would make (dry-run)')
    .option('-f, --file <path>', 'Schema file path', DEFAULT_FILE)
    .option('-c, --connection <string>', 'Connection string (overrides DBCONVERGE_CONNECTION_STRING)')
    .option('--json', 'Output result as JSON')
    .action(async (options: CommandOptions) => {
      try {
        const { planCommand } = await import('./plan.js');
        await planCommand({ ...options, quiet: quiet() });
      } catch (error) {
        handleError(error, options.json);
      }
    });

  program
    .command('align')
    .description('Converge the server toward the declared schema')
    .option('-f, --file <path>', 'Schema file path', DEFAULT_FILE)
    .option('-c, --connection <string>', 'Connection string (overrides DBCONVERGE_CONNECTION_STRING)')
    .option('--auto-approve', 'Apply every change without confirmation')
    .option('--json', 'Output result as JSON')
    .action(async (options: CommandOptions) => {
      try {
        const { alignCommand } = await import('./align.js');
        await alignCommand({ ...options, quiet: quiet() });
      } catch (error) {
        handleError(error, options.json);
      }
    });
}
