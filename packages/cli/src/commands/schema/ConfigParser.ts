/**
 * Config Parser - Declared Schema Parsing and Validation
 *
 * Parses YAML schema files and validates them against the Zod schemas.
 * Validation failures are reported with the path of the offending field.
 *
 * @module packages/cli/commands/schema/ConfigParser
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import {
  ConfigError,
  ConfigNotFoundError,
  ConfigValidationError,
  ErrorCodes,
  type DeclaredNode,
} from '@dbconverge/core/domain';
import { SchemaFileSchema, type SchemaFile } from './schemas.js';
import { toDeclaredServer } from './toDeclared.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Parse result with the validated file and metadata
 */
export interface ParseResult {
  /** Parsed and validated schema file */
  config: SchemaFile;
  /** Source file path (if parsed from file) */
  sourcePath?: string;
  /** Warnings (non-fatal issues) */
  warnings: string[];
}

export interface LoadResult extends ParseResult {
  /** Declared tree built from the file */
  declared: DeclaredNode<'server'>;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Render a Zod issue as `path: message`
 */
export function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Parse a YAML schema file
 *
 * @throws ConfigNotFoundError if the file does not exist
 * @throws ConfigError if the file cannot be read or parsed
 * @throws ConfigValidationError if validation fails
 */
export function parseSchemaFile(filePath: string): ParseResult {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigNotFoundError(filePath);
  }

  let content: string;
  try {
    content = fs.readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read schema file: ${filePath}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  return { ...parseSchemaString(content), sourcePath: absolutePath };
}

/**
 * Parse a YAML schema string
 *
 * @throws ConfigError on YAML syntax errors
 * @throws ConfigValidationError if validation fails
 */
export function parseSchemaString(content: string): ParseResult {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new ConfigError('YAML syntax error', {
        code: ErrorCodes.CONFIG_PARSE_ERROR,
        details: [`line ${error.mark.line + 1}: ${error.reason}`],
        cause: error,
      });
    }
    throw error;
  }

  if (raw === null || raw === undefined) {
    throw new ConfigError('Schema file is empty', {
      suggestion: 'Declare at least `version: "1"`.',
    });
  }

  const parsed = SchemaFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(parsed.error.issues.map(formatIssue));
  }

  return { config: parsed.data, warnings: generateWarnings(parsed.data) };
}

/**
 * Parse a schema file and build its declared tree
 *
 * @throws DeclarationError when the file is valid but declares an invalid tree
 */
export function loadDeclaredServer(filePath: string): LoadResult {
  const result = parseSchemaFile(filePath);
  return { ...result, declared: toDeclaredServer(result.config) };
}

// ============================================================================
// Warnings
// ============================================================================

function generateWarnings(config: SchemaFile): string[] {
  const warnings: string[] = [];
  const { logins, databases } = config.server;

  if (logins.length === 0 && databases.length === 0) {
    warnings.push('No logins or databases declared');
  }

  const sysadmins = logins.filter((l) => l.serverRoles.some((role) => role.toLowerCase() === 'sysadmin'));
  if (sysadmins.length > 0) {
    warnings.push(`sysadmin granted to: ${sysadmins.map((l) => l.name).join(', ')}`);
  }

  for (const db of databases) {
    const tables = [...(db.tables ?? []), ...(db.schemas ?? []).flatMap((s) => s.tables)];
    const keyless = tables.filter((t) => t.primaryKey === undefined && !t.columns.some((c) => c.primaryKey));
    if (keyless.length > 0) {
      warnings.push(`Tables without a primary key in ${db.name}: ${keyless.map((t) => t.name).join(', ')}`);
    }
  }

  return warnings;
}
