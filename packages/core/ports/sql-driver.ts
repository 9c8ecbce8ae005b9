/**
 * ISqlDriver Interface
 *
 * Port interface for the backend driver: executes rendered statements
 * against the live server and owns the connection and transaction primitives.
 */

// =============================================================================
// Statements and Results
// =============================================================================

export type SqlParam = string | number | boolean | Date | null;

/**
 * Statement text with its named parameters.
 *
 * Produced by the schema dialect and passed to the driver without inspection.
 */
export interface SqlStatement {
  readonly text: string;
  readonly params?: Readonly<Record<string, SqlParam>>;
}

/** One result row, keyed by the field names the query selects */
export type Row = Readonly<Record<string, unknown>>;

export interface RowSet {
  readonly rows: readonly Row[];
  readonly rowsAffected: number;
}

export interface ExecuteOptions {
  /** Database the statement runs in; the current one when omitted */
  database?: string;
}

// =============================================================================
// ISqlDriver Interface
// =============================================================================

/**
 * Port interface for statement execution.
 *
 * One connection per alignment run; calls never overlap.
 */
export interface ISqlDriver {
  /**
   * Execute one statement and return its first result set.
   *
   * Mutations run inside an open transaction until `commit()` unless called
   * within `withAutocommit`.
   */
  execute(statement: SqlStatement, options?: ExecuteOptions): Promise<RowSet>;

  /** Commit the open transaction, if any */
  commit(): Promise<void>;

  /**
   * Run `fn` outside any transaction, for statements the server refuses
   * inside one (database creation, rename and options).
   */
  withAutocommit<R>(fn: () => Promise<R>): Promise<R>;

  /** Release the connection */
  close(): Promise<void>;
}
