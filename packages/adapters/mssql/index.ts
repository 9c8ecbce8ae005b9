/**
 * SQL Server Adapters
 *
 * Backend driver and statement dialect for SQL Server.
 *
 * @module packages/adapters/mssql
 */

// =============================================================================
// Driver
// =============================================================================

export {
  MssqlDriver,
  singleConnection,
  type MssqlConnection,
  type MssqlDriverConfig,
} from './MssqlDriver.js';

// =============================================================================
// Dialect
// =============================================================================

export { TsqlDialect } from './TsqlDialect.js';
export { renderColumn, renderDataType } from './column-definition.js';
export { keyword, qualifiedName, quoteLiteral, quoteName } from './quoting.js';
