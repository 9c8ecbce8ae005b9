/**
 * Column Type Categories
 *
 * Which storage types carry which precision attributes. Precision values are
 * only meaningful (non-null) for the categories that take them.
 *
 * @module packages/core/domain/column-types
 */

/** No parameters */
export const INT_TYPES: ReadonlySet<string> = new Set(['bigint', 'int', 'smallint', 'tinyint']);

/** Precision and optional scale */
export const NUMERIC_TYPES: ReadonlySet<string> = new Set(['decimal', 'numeric']);

/** No parameters */
export const MONEY_TYPES: ReadonlySet<string> = new Set(['money', 'smallmoney']);

/** Precision only */
export const APPROX_NUMBER_TYPES: ReadonlySet<string> = new Set(['float', 'real']);

/** No parameters */
export const DATETIME_NO_PRECISION_TYPES: ReadonlySet<string> = new Set(['date', 'datetime', 'smalldatetime']);

/** Fractional seconds precision */
export const DATETIME_PRECISION_TYPES: ReadonlySet<string> = new Set(['time', 'datetime2', 'datetimeoffset']);

/** Maximum length */
export const CHAR_TYPES: ReadonlySet<string> = new Set([
  'char',
  'varchar',
  'nchar',
  'nvarchar',
  'binary',
  'varbinary',
]);

/** Types a range partition can be built on */
export const PARTITIONABLE_TYPES: ReadonlySet<string> = new Set(['datetime', 'datetime2']);

export const DEFAULT_DATETIME_PRECISION = 7;

export function carriesNumericPrecision(dataType: string): boolean {
  const type = dataType.toLowerCase();
  return NUMERIC_TYPES.has(type) || APPROX_NUMBER_TYPES.has(type);
}

export function carriesNumericScale(dataType: string): boolean {
  return NUMERIC_TYPES.has(dataType.toLowerCase());
}

export function carriesDatetimePrecision(dataType: string): boolean {
  return DATETIME_PRECISION_TYPES.has(dataType.toLowerCase());
}

export function carriesCharLength(dataType: string): boolean {
  return CHAR_TYPES.has(dataType.toLowerCase());
}

export function isSupportedDataType(dataType: string): boolean {
  const type = dataType.toLowerCase();
  return [
    INT_TYPES,
    NUMERIC_TYPES,
    MONEY_TYPES,
    APPROX_NUMBER_TYPES,
    DATETIME_NO_PRECISION_TYPES,
    DATETIME_PRECISION_TYPES,
    CHAR_TYPES,
  ].some((category) => category.has(type));
}
