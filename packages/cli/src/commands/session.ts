/**
 * Server Session
 *
 * Connects to the server named by the connection string and hands back an
 * engine bound to the reflected server. The caller closes the session.
 *
 * @module packages/cli/commands/session
 */

import chalk from 'chalk';
import ora from 'ora';
import { MssqlDriver, TsqlDialect } from '@dbconverge/adapters/mssql';
import type { IConfirmationProvider } from '@dbconverge/core/ports';
import { AlignEngine, type ReflectedNode } from '@dbconverge/reconciler';
import { createLogger, getConnectionString } from './utils.js';

export interface SessionOptions {
  connection?: string;
  json?: boolean;
  quiet?: boolean;
}

export interface Session {
  engine: AlignEngine;
  root: ReflectedNode<'server'>;
  close(): Promise<void>;
}

/**
 * @throws ConfigError when no connection string is configured
 * @throws DriverError when the server cannot be reached
 */
export async function openSession(options: SessionOptions, confirm: IConfirmationProvider): Promise<Session> {
  const connection = getConnectionString(options);
  const logger = createLogger();
  const driver = new MssqlDriver({ connection, logger });
  const engine = new AlignEngine({ driver, dialect: new TsqlDialect(), logger, confirm });

  const spinner = options.json || options.quiet ? null : ora('Connecting to server...').start();
  try {
    const root = await engine.reflect();
    spinner?.succeed(`Connected to ${chalk.cyan(root.name)}`);
    return { engine, root, close: () => driver.close() };
  } catch (error) {
    spinner?.fail('Could not connect');
    await driver.close();
    throw error;
  }
}
