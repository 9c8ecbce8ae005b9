#!/usr/bin/env node
/**
 * dbconverge CLI
 *
 * Entry point for the `dbconverge` command.
 *
 * @module packages/cli/bin/dbconverge
 */

import { Command } from 'commander';
import { registerCommands } from '../commands/index.js';

const program = new Command();

program
  .name('dbconverge')
  .description('Converge a SQL Server toward a declared schema')
  .version('0.1.0')
  .showSuggestionAfterError();

registerCommands(program);

await program.parseAsync();
