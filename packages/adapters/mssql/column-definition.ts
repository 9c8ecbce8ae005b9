/**
 * Column definitions
 *
 * Renders the `[name] type(args) [IDENTITY(1,1)] [NOT] NULL` fragment used by
 * CREATE TABLE, ADD and ALTER COLUMN, and the bare type used by partition
 * functions.
 *
 * @module packages/adapters/mssql/column-definition
 */

import {
  carriesCharLength,
  carriesDatetimePrecision,
  carriesNumericPrecision,
  carriesNumericScale,
  DeclarationError,
  DEFAULT_DATETIME_PRECISION,
  ErrorCodes,
  isSupportedDataType,
} from '@dbconverge/core/domain';
import type { ColumnDefinition } from '@dbconverge/core/ports';
import { quoteName } from './quoting.js';

type DataTypeParts = Pick<
  ColumnDefinition,
  'name' | 'dataType' | 'charMaxLen' | 'datetimePrecision' | 'numericPrecision' | 'numericScale'
>;

function invalid(column: DataTypeParts, message: string): DeclarationError {
  return new DeclarationError(`Column "${column.name}": ${message}`, { code: ErrorCodes.DECLARATION_INVALID_VALUE });
}

/**
 * @throws DeclarationError for unsupported types or missing length/precision
 */
export function renderDataType(column: DataTypeParts): string {
  const type = column.dataType.toLowerCase();
  if (!isSupportedDataType(type)) {
    throw invalid(column, `unsupported column type "${column.dataType}"`);
  }

  if (carriesNumericPrecision(type)) {
    if (column.numericPrecision === null) {
      throw invalid(column, `numeric precision is required for ${type}`);
    }
    if (carriesNumericScale(type) && column.numericScale !== null) {
      return `${type}(${column.numericPrecision},${column.numericScale})`;
    }
    return `${type}(${column.numericPrecision})`;
  }
  if (carriesDatetimePrecision(type)) {
    return `${type}(${column.datetimePrecision ?? DEFAULT_DATETIME_PRECISION})`;
  }
  if (carriesCharLength(type)) {
    if (column.charMaxLen === null) {
      throw invalid(column, `a length is required for ${type}`);
    }
    // the catalogue reports (max) as -1
    return `${type}(${column.charMaxLen === -1 ? 'max' : column.charMaxLen})`;
  }
  return type;
}

export function renderColumn(column: ColumnDefinition): string {
  const parts = [quoteName(column.name), renderDataType(column)];
  if (column.identity) {
    parts.push('IDENTITY(1,1)');
  }
  parts.push(column.nullable ? 'NULL' : 'NOT NULL');
  return parts.join(' ');
}
