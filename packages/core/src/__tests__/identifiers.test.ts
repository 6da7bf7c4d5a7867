import { describe, it, expect } from 'vitest';
import { ParseObjectName, QualifiedName, QuoteName } from '../db/identifiers';
import { SqlStewardError } from '../core/errors';

describe('QuoteName', () => {
  it('wraps an identifier in brackets', () => {
    expect(QuoteName('Order Details')).toBe('[Order Details]');
  });

  it('doubles closing brackets', () => {
    expect(QuoteName('odd]name')).toBe('[odd]]name]');
  });
});

describe('QualifiedName', () => {
  it('joins schema and name', () => {
    expect(QualifiedName({ Schema: 'sales', Name: 'Orders' })).toBe('[sales].[Orders]');
  });
});

describe('ParseObjectName', () => {
  it('uses the default schema for a one-part name', () => {
    expect(ParseObjectName('Orders')).toEqual({ Schema: 'dbo', Name: 'Orders' });
  });

  it('uses a custom default schema', () => {
    expect(ParseObjectName('Orders', 'sales')).toEqual({ Schema: 'sales', Name: 'Orders' });
  });

  it('splits a two-part name', () => {
    expect(ParseObjectName('sales.Orders')).toEqual({ Schema: 'sales', Name: 'Orders' });
  });

  it('keeps dots and spaces inside brackets', () => {
    expect(ParseObjectName('[my schema].[my.table]')).toEqual({ Schema: 'my schema', Name: 'my.table' });
  });

  it('unescapes doubled closing brackets', () => {
    expect(ParseObjectName('[odd]]name]')).toEqual({ Schema: 'dbo', Name: 'odd]name' });
  });

  it('trims surrounding whitespace', () => {
    expect(ParseObjectName('  dbo.Orders ')).toEqual({ Schema: 'dbo', Name: 'Orders' });
  });

  it('round-trips through QualifiedName', () => {
    const parsed = ParseObjectName('[a]]b].[c.d]');
    expect(ParseObjectName(QualifiedName(parsed))).toEqual(parsed);
  });

  it.each([
    ['', 'name is empty'],
    ['   ', 'name is empty'],
    ['a.b.c', 'expected at most two parts (schema.name)'],
    ['[abc', 'unterminated "["'],
    ['dbo.', 'empty name part'],
    ['.Orders', 'empty name part'],
    ['[]', 'empty name part'],
    ['a[b]', 'unexpected "[" at position 2'],
    ['[a]b', 'unexpected "b" after "]" at position 4'],
    ['[dbo].[a]x', 'unexpected "x" after "]" at position 10'],
  ])('rejects %j', (input, reason) => {
    expect(() => ParseObjectName(input)).toThrow(SqlStewardError);
    expect(() => ParseObjectName(input)).toThrow(`Invalid object name "${input}": ${reason}`);
  });
});
