/**
 * Declared Schema Files
 *
 * @module packages/cli/commands/schema
 */

export {
  formatIssue,
  loadDeclaredServer,
  parseSchemaFile,
  parseSchemaString,
  type LoadResult,
  type ParseResult,
} from './ConfigParser.js';
export { SchemaFileSchema, type SchemaFile } from './schemas.js';
export { toColumn, toDeclaredServer, toTable } from './toDeclared.js';
