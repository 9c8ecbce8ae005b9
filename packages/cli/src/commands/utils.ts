/**
 * CLI Utilities
 *
 * Environment, logging and error handling shared by the commands.
 *
 * @module packages/cli/commands/utils
 */

import chalk from 'chalk';
import pino, { type Logger } from 'pino';
import { ConfigError, ErrorCodes, getErrorCode, isConvergeError } from '@dbconverge/core/domain';

// =============================================================================
// Environment & Configuration
// =============================================================================

export const CONNECTION_ENV = 'DBCONVERGE_CONNECTION_STRING';

/**
 * Gets the connection string
 *
 * Resolution order:
 * 1. --connection CLI option
 * 2. DBCONVERGE_CONNECTION_STRING environment variable
 *
 * @throws ConfigError if neither is set
 */
export function getConnectionString(options: { connection?: string }): string {
  const connection = options.connection || process.env[CONNECTION_ENV];
  if (!connection) {
    throw new ConfigError('Connection string not found', {
      code: ErrorCodes.CONFIG_CONNECTION_MISSING,
      suggestion: `Set ${CONNECTION_ENV} or pass --connection.`,
    });
  }
  return connection;
}

/**
 * Logger writing to stderr, leaving stdout to command output.
 * LOG_LEVEL selects the level.
 */
export function createLogger(): Logger {
  return pino({ name: 'dbconverge', level: process.env.LOG_LEVEL ?? 'info' }, pino.destination(2));
}

// =============================================================================
// TTY Detection & Color Control
// =============================================================================

/**
 * Colors are off for NO_COLOR, TERM=dumb and non-TTY output
 */
export function shouldUseColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.TERM === 'dumb') return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

/**
 * Schema file warnings, on stderr
 */
export function printWarnings(warnings: readonly string[], options: { json?: boolean; quiet?: boolean }): void {
  if (options.json || options.quiet) {
    return;
  }
  for (const warning of warnings) {
    console.warn(chalk.yellow(`⚠ ${warning}`));
  }
}

// =============================================================================
// Error Handling
// =============================================================================

export const ExitCodes = {
  SUCCESS: 0,
  ERROR: 1,
} as const;

/**
 * Error as printed by the CLI
 */
export function describeError(error: unknown): { message: string; code: string; display: string } {
  const message = error instanceof Error ? error.message : String(error);
  const code = getErrorCode(error);
  const display = isConvergeError(error) ? error.toDisplayString() : `${message} [${code}]`;
  return { message, code, display };
}

/**
 * Prints an error and exits
 *
 * @param json - Whether to output as JSON
 */
export function handleError(error: unknown, json: boolean = false): never {
  const { message, code, display } = describeError(error);

  if (json) {
    console.log(
      JSON.stringify(
        {
          success: false,
          error: isConvergeError(error) ? error.toJSON() : { message, code },
        },
        null,
        2
      )
    );
  } else {
    console.error(chalk.red(`Error: ${display}`));
  }

  process.exit(ExitCodes.ERROR);
}
