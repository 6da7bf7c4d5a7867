import { describe, it, expect } from 'vitest';
import { BuildTable, InferColumns } from '../bulk/table-schema';
import { SqlStewardError } from '../core/errors';

describe('InferColumns', () => {
  it('maps each value type to a column type', () => {
    const columns = InferColumns([
      {
        ID: 1,
        Big: 3_000_000_000,
        Huge: BigInt(9),
        Price: 9.5,
        Name: 'Widget',
        Active: true,
        CreatedAt: new Date(0),
        Photo: Buffer.from('abc'),
      },
    ]);

    expect(columns.map((c) => [c.Name, c.SqlTypeName])).toEqual([
      ['ID', 'INT'],
      ['Big', 'BIGINT'],
      ['Huge', 'BIGINT'],
      ['Price', 'FLOAT'],
      ['Name', 'NVARCHAR(MAX)'],
      ['Active', 'BIT'],
      ['CreatedAt', 'DATETIME2'],
      ['Photo', 'VARBINARY(MAX)'],
    ]);
  });

  it('treats negative 32-bit integers as INT', () => {
    const [column] = InferColumns([{ Delta: -2_147_483_648 }]);
    expect(column.SqlTypeName).toBe('INT');
  });

  it('uses the first non-null value across rows', () => {
    const [column] = InferColumns([{ Qty: null }, { Qty: undefined }, { Qty: 12 }]);
    expect(column.SqlTypeName).toBe('INT');
  });

  it('falls back to NVARCHAR(MAX) for a column that is always null', () => {
    const [column] = InferColumns([{ Notes: null }, { Notes: null }]);
    expect(column.SqlTypeName).toBe('NVARCHAR(MAX)');
  });

  it('takes column names from the first row only', () => {
    const columns = InferColumns([{ A: 1 }, { A: 2, B: 'extra' }]);
    expect(columns.map((c) => c.Name)).toEqual(['A']);
  });

  it('rejects an empty row set', () => {
    expect(() => InferColumns([])).toThrow(SqlStewardError);
    expect(() => InferColumns([])).toThrow('Cannot infer table columns from an empty row set');
  });
});

describe('BuildTable', () => {
  it('adds every column and sets the create flag', () => {
    const columns = InferColumns([{ ID: 1, Name: 'a' }]);
    const table = BuildTable('[dbo].[Imported]', columns, true);

    expect(table.create).toBe(true);
    expect(table.columns).toHaveLength(2);
    expect(table.rows).toHaveLength(0);
  });
});
