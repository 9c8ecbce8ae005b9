/**
 * Terminal Confirmation
 *
 * Asks on the terminal before each change; only `y` or `yes` approves.
 *
 * @module packages/cli/commands/prompt
 */

import chalk from 'chalk';
import * as readline from 'readline';
import type { IConfirmationProvider } from '@dbconverge/core/ports';

export function isApproval(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export class TerminalConfirmation implements IConfirmationProvider {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async confirm(description: string): Promise<boolean> {
    const rl = readline.createInterface({ input: this.input, output: this.output });

    return new Promise((resolve) => {
      // input ending without an answer declines
      rl.once('close', () => resolve(false));
      rl.question(`${chalk.yellow(description)} ${chalk.dim('[y/N]')} `, (answer) => {
        resolve(isApproval(answer));
        rl.close();
      });
    });
  }
}
