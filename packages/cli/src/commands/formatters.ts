/**
 * Output Formatters
 *
 * Human-readable rendering of alignment reports and plans.
 *
 * @module packages/cli/commands/formatters
 */

import chalk from 'chalk';
import { OUTCOME_STATUSES, type AlignOperation, type AlignOutcome, type AlignReport, type OutcomeStatus } from '@dbconverge/reconciler';

// ============================================================================
// Symbols and Colors
// ============================================================================

export const Symbols = {
  create: '+',
  update: '~',
  rename: '>',
  delete: '-',
  bullet: '•',
  arrow: '→',
} as const satisfies Record<AlignOperation | 'bullet' | 'arrow', string>;

export function colorByStatus(status: OutcomeStatus, text: string): string {
  switch (status) {
    case 'applied':
      return chalk.green(text);
    case 'declined':
      return chalk.yellow(text);
    case 'unsupported':
      return chalk.magenta(text);
    case 'refused':
      return chalk.red(text);
    case 'skipped':
      return chalk.dim(text);
  }
}

// ============================================================================
// Outcomes
// ============================================================================

/**
 * One line per outcome:
 * `  + create table       app.dbo.Person`
 */
export function formatOutcome(outcome: AlignOutcome): string {
  let line = `  ${Symbols[outcome.operation]} ${outcome.operation.padEnd(6)} ${outcome.entityType.padEnd(11)} ${outcome.path}`;

  if (outcome.attribute !== undefined) {
    line += ` ${outcome.attribute}: ${outcome.from ?? 'null'} ${Symbols.arrow} ${outcome.to ?? 'null'}`;
  } else if (outcome.operation === 'rename' && outcome.to !== undefined) {
    line += ` ${Symbols.arrow} ${outcome.to}`;
  }

  if (outcome.status !== 'applied') {
    line += ` (${outcome.status}${outcome.reason ? `: ${outcome.reason}` : ''})`;
  }

  return colorByStatus(outcome.status, line);
}

export function formatSummary(report: AlignReport): string {
  const counts = OUTCOME_STATUSES.map((status) => colorByStatus(status, `${report.summary[status]} ${status}`));
  return `${counts.join(', ')} (${report.summary.total} total)`;
}

export function formatReport(report: AlignReport): string {
  const lines: string[] = [chalk.bold('\nAlignment Report\n')];

  if (report.outcomes.length === 0) {
    lines.push(chalk.dim('  No changes. The server matches the declared schema.\n'));
    return lines.join('\n');
  }

  for (const outcome of report.outcomes) {
    lines.push(formatOutcome(outcome));
  }
  lines.push('', `  ${formatSummary(report)}`, '');
  return lines.join('\n');
}

// ============================================================================
// Plans
// ============================================================================

/**
 * Changes an approving run would attempt, as asked of the confirmation gate
 */
export function formatPlan(planned: readonly string[]): string {
  const lines: string[] = [chalk.bold.cyan('\nExecution Plan\n')];

  if (planned.length === 0) {
    lines.push(chalk.dim('  No changes. The server matches the declared schema.\n'));
    return lines.join('\n');
  }

  for (const description of planned) {
    lines.push(`  ${Symbols.bullet} ${description}`);
  }
  lines.push(
    '',
    chalk.dim(`  ${planned.length} change(s) planned. Changes nested under a planned creation appear once it exists.`),
    chalk.dim('  To apply these changes, run: dbconverge align\n')
  );
  return lines.join('\n');
}
