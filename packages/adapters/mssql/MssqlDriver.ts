/**
 * SQL Server Backend Driver
 *
 * Runs rendered statements over a single mssql connection. Statements join a
 * transaction begun lazily on first use and kept open until `commit()`;
 * `withAutocommit` runs its callback with no transaction open. The database
 * context is switched with USE only when a statement asks for another one.
 *
 * @module packages/adapters/mssql/MssqlDriver
 */

import sql from 'mssql';
import type { config as MssqlConfig, ConnectionPool, Request, Transaction } from 'mssql';
import type { Logger } from 'pino';
import { DriverError, ErrorCodes } from '@dbconverge/core/domain';
import type { ExecuteOptions, ISqlDriver, RowSet, SqlStatement } from '@dbconverge/core/ports';
import { quoteName } from './quoting.js';

// ============================================================================
// Types
// ============================================================================

export type MssqlConnection = string | MssqlConfig;

export interface MssqlDriverConfig {
  /** mssql connection string or config object */
  connection: MssqlConnection;
  /** Logger instance */
  logger: Logger;
}

// ============================================================================
// Helpers
// ============================================================================

const MAX_POOL_SIZE = /max pool size\s*=\s*\d+/i;

/**
 * Limit the pool to one connection, so the transaction and the USE context
 * are shared by every statement.
 */
export function singleConnection(connection: MssqlConnection): MssqlConnection {
  if (typeof connection === 'string') {
    if (MAX_POOL_SIZE.test(connection)) {
      return connection.replace(MAX_POOL_SIZE, 'Max Pool Size=1');
    }
    return `${connection.replace(/;\s*$/, '')};Max Pool Size=1`;
  }
  return { ...connection, pool: { ...connection.pool, min: 0, max: 1 } };
}

function createPool(connection: MssqlConnection): ConnectionPool {
  return typeof connection === 'string' ? new sql.ConnectionPool(connection) : new sql.ConnectionPool(connection);
}

function causeOf(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

// ============================================================================
// MssqlDriver
// ============================================================================

/**
 * @example
 * ```typescript
 * const driver = new MssqlDriver({ connection: process.env.DBCONVERGE_CONNECTION_STRING ?? '', logger });
 * try {
 *   const engine = new AlignEngine({ driver, dialect: new TsqlDialect(), logger });
 *   await engine.alignServer(declared);
 * } finally {
 *   await driver.close();
 * }
 * ```
 */
export class MssqlDriver implements ISqlDriver {
  private readonly connection: MssqlConnection;
  private readonly logger: Logger;

  private pool: ConnectionPool | null = null;
  private transaction: Transaction | null = null;
  private database: string | null = null;
  private autocommit = false;
  private closed = false;

  constructor(config: MssqlDriverConfig) {
    this.connection = singleConnection(config.connection);
    this.logger = config.logger.child({ component: 'MssqlDriver' });
  }

  async execute(statement: SqlStatement, options: ExecuteOptions = {}): Promise<RowSet> {
    if (options.database !== undefined && options.database !== this.database) {
      await this.run({ text: `USE ${quoteName(options.database)}` });
      this.database = options.database;
    }
    return this.run(statement);
  }

  async commit(): Promise<void> {
    const transaction = this.transaction;
    if (!transaction) {
      return;
    }
    this.transaction = null;
    // the connection returns to the pool; the next one may have another context
    this.database = null;
    try {
      await transaction.commit();
    } catch (error) {
      throw new DriverError('Commit failed', { cause: causeOf(error) });
    }
    this.logger.debug('Transaction committed');
  }

  async withAutocommit<R>(fn: () => Promise<R>): Promise<R> {
    await this.commit();
    this.autocommit = true;
    try {
      return await fn();
    } finally {
      this.autocommit = false;
      this.database = null;
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const { transaction, pool } = this;
    this.transaction = null;
    this.pool = null;
    try {
      if (transaction) {
        this.logger.warn('Rolling back uncommitted statements');
        await transaction.rollback();
      }
    } finally {
      await pool?.close();
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async run(statement: SqlStatement): Promise<RowSet> {
    const request = await this.request();
    for (const [name, value] of Object.entries(statement.params ?? {})) {
      request.input(name, value);
    }

    this.logger.debug({ statement: statement.text, params: statement.params }, 'Executing statement');
    try {
      const result = await request.query(statement.text);
      return {
        rows: result.recordset ?? [],
        rowsAffected: result.rowsAffected.reduce((sum, count) => sum + count, 0),
      };
    } catch (error) {
      throw new DriverError('Statement failed', { statement: statement.text, cause: causeOf(error) });
    }
  }

  private async request(): Promise<Request> {
    const pool = await this.connect();
    if (this.autocommit) {
      return new sql.Request(pool);
    }
    if (!this.transaction) {
      const transaction = new sql.Transaction(pool);
      try {
        await transaction.begin();
      } catch (error) {
        throw new DriverError('Could not begin a transaction', { cause: causeOf(error) });
      }
      this.transaction = transaction;
    }
    return new sql.Request(this.transaction);
  }

  private async connect(): Promise<ConnectionPool> {
    if (this.closed) {
      throw new DriverError('Driver is closed', { code: ErrorCodes.DRIVER_CLOSED });
    }
    if (this.pool) {
      return this.pool;
    }

    const pool = createPool(this.connection);
    try {
      await pool.connect();
    } catch (error) {
      throw new DriverError('Could not connect to the server', {
        code: ErrorCodes.DRIVER_CONNECTION_FAILED,
        cause: causeOf(error),
      });
    }
    this.logger.info('Connected');
    this.pool = pool;
    return pool;
  }
}
