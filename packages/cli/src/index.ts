/**
 * dbconverge CLI
 *
 * Commands and schema file loading for the `dbconverge` command.
 *
 * @module @dbconverge/cli
 */

// =============================================================================
// Command Exports
// =============================================================================

export { registerCommands } from './commands/index.js';
export { alignCommand, type AlignCommandOptions } from './commands/align.js';
export { planCommand, type PlanCommandOptions } from './commands/plan.js';
export { countDeclared, validateCommand, type ValidateCommandOptions } from './commands/validate.js';

// =============================================================================
// Utility Exports
// =============================================================================

export * from './commands/schema/index.js';
export { formatOutcome, formatPlan, formatReport, formatSummary } from './commands/formatters.js';
export { isApproval, TerminalConfirmation } from './commands/prompt.js';
export { createLogger, ExitCodes, getConnectionString, handleError } from './commands/utils.js';
