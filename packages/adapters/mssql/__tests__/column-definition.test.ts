/**
 * Column Definition Tests
 *
 * @module packages/adapters/mssql/__tests__/column-definition.test
 */

import { describe, it, expect } from 'vitest';
import { DeclarationError } from '@dbconverge/core/domain';
import type { ColumnDefinition } from '@dbconverge/core/ports';
import { renderColumn, renderDataType } from '../column-definition.js';
import { keyword, qualifiedName, quoteLiteral, quoteName } from '../quoting.js';

function columnOf(init: Partial<ColumnDefinition>): ColumnDefinition {
  return {
    name: 'Value',
    dataType: 'int',
    charMaxLen: null,
    datetimePrecision: null,
    numericPrecision: null,
    numericScale: null,
    nullable: true,
    identity: false,
    ...init,
  };
}

describe('quoting', () => {
  it('brackets identifiers and doubles closing brackets', () => {
    expect(quoteName('Person')).toBe('[Person]');
    expect(quoteName('odd]name')).toBe('[odd]]name]');
    expect(qualifiedName('dbo', 'Person', 'IX_id')).toBe('[dbo].[Person].[IX_id]');
  });

  it('N-quotes literals and doubles quotes', () => {
    expect(quoteLiteral("D:\\data\\o'brien.mdf")).toBe("N'D:\\data\\o''brien.mdf'");
  });

  it('accepts keywords from the set in any case', () => {
    expect(keyword('page', ['NONE', 'ROW', 'PAGE'], 'data compression')).toBe('PAGE');
  });

  it('rejects keywords outside the set', () => {
    expect(() => keyword('ZIP', ['NONE', 'ROW', 'PAGE'], 'data compression')).toThrow(
      'Invalid data compression: ZIP'
    );
  });
});

describe('renderDataType', () => {
  it('renders precision and scale for decimal types', () => {
    expect(renderDataType(columnOf({ dataType: 'decimal', numericPrecision: 18, numericScale: 4 }))).toBe(
      'decimal(18,4)'
    );
  });

  it('renders precision alone for float', () => {
    expect(renderDataType(columnOf({ dataType: 'float', numericPrecision: 53 }))).toBe('float(53)');
  });

  it('defaults datetime precision', () => {
    expect(renderDataType(columnOf({ dataType: 'datetime2' }))).toBe('datetime2(7)');
    expect(renderDataType(columnOf({ dataType: 'datetime2', datetimePrecision: 3 }))).toBe('datetime2(3)');
  });

  it('renders max lengths', () => {
    expect(renderDataType(columnOf({ dataType: 'nvarchar', charMaxLen: -1 }))).toBe('nvarchar(max)');
    expect(renderDataType(columnOf({ dataType: 'VARCHAR', charMaxLen: 255 }))).toBe('varchar(255)');
  });

  it('leaves types without arguments bare', () => {
    expect(renderDataType(columnOf({ dataType: 'int' }))).toBe('int');
    expect(renderDataType(columnOf({ dataType: 'date' }))).toBe('date');
  });

  it('requires a length for character types', () => {
    expect(() => renderDataType(columnOf({ name: 'Name', dataType: 'varchar' }))).toThrow(
      'Column "Name": a length is required for varchar'
    );
  });

  it('rejects unsupported types', () => {
    expect(() => renderDataType(columnOf({ dataType: 'geography' }))).toThrow(DeclarationError);
  });
});

describe('renderColumn', () => {
  it('renders identity and nullability', () => {
    expect(renderColumn(columnOf({ name: 'ID', dataType: 'bigint', identity: true, nullable: false }))).toBe(
      '[ID] bigint IDENTITY(1,1) NOT NULL'
    );
    expect(renderColumn(columnOf({ name: 'Name', dataType: 'varchar', charMaxLen: 50 }))).toBe(
      '[Name] varchar(50) NULL'
    );
  });
});
