import { describe, it, expect } from 'vitest';
import { BuildKnownPlainText, BuildStandInDefinition } from '../decrypt/templates';
import { DecryptionError, DecryptionLengthError } from '../core/errors';
import { EncryptedObject, EncryptedObjectType } from '../decrypt/types';

function makeObject(type: EncryptedObjectType, name: string = 'usp_Payroll'): EncryptedObject {
  return { Database: 'Sales', Schema: 'dbo', Name: name, Type: type, ParentSchema: null, ParentName: null };
}

describe('BuildStandInDefinition', () => {
  it('builds a procedure stand-in', () => {
    expect(BuildStandInDefinition(makeObject('P'))).toBe(
      'ALTER PROCEDURE [dbo].[usp_Payroll] WITH ENCRYPTION AS RETURN 0;'
    );
  });

  it('builds a scalar function stand-in', () => {
    expect(BuildStandInDefinition(makeObject('FN', 'fn_Tax'))).toBe(
      'ALTER FUNCTION [dbo].[fn_Tax]() RETURNS INT WITH ENCRYPTION AS BEGIN RETURN 0 END;'
    );
  });

  it('builds an inline table function stand-in', () => {
    expect(BuildStandInDefinition(makeObject('IF', 'fn_Rows'))).toBe(
      'ALTER FUNCTION [dbo].[fn_Rows]() RETURNS TABLE WITH ENCRYPTION AS RETURN SELECT 0 AS c;'
    );
  });

  it('builds a multi-statement table function stand-in', () => {
    expect(BuildStandInDefinition(makeObject('TF', 'fn_Multi'))).toBe(
      'ALTER FUNCTION [dbo].[fn_Multi]() RETURNS @t TABLE (c INT) WITH ENCRYPTION AS BEGIN RETURN END;'
    );
  });

  it('builds a view stand-in', () => {
    expect(BuildStandInDefinition(makeObject('V', 'vw_Salaries'))).toBe(
      'ALTER VIEW [dbo].[vw_Salaries] WITH ENCRYPTION AS SELECT 0 AS c;'
    );
  });

  it('builds a trigger stand-in on its parent table', () => {
    const trigger: EncryptedObject = {
      ...makeObject('TR', 'trg_Audit'),
      ParentSchema: 'hr',
      ParentName: 'Employees',
    };
    expect(BuildStandInDefinition(trigger)).toBe(
      'ALTER TRIGGER [dbo].[trg_Audit] ON [hr].[Employees] WITH ENCRYPTION FOR INSERT AS RETURN;'
    );
  });

  it('rejects a trigger without a parent table', () => {
    expect(() => BuildStandInDefinition(makeObject('TR', 'trg_Orphan'))).toThrow(DecryptionError);
    expect(() => BuildStandInDefinition(makeObject('TR', 'trg_Orphan'))).toThrow(
      'Trigger [dbo].[trg_Orphan] has no parent table'
    );
  });

  it('quotes closing brackets in names', () => {
    expect(BuildStandInDefinition(makeObject('V', 'odd]view'))).toBe(
      'ALTER VIEW [dbo].[odd]]view] WITH ENCRYPTION AS SELECT 0 AS c;'
    );
  });
});

describe('BuildKnownPlainText', () => {
  const object = makeObject('P');
  const standIn = BuildStandInDefinition(object);

  it('left-pads the stand-in to the requested length', () => {
    const text = BuildKnownPlainText(object, standIn.length + 12);
    expect(text.length).toBe(standIn.length + 12);
    expect(text).toBe(' '.repeat(12) + standIn);
  });

  it('returns the stand-in unchanged when it is exactly the requested length', () => {
    expect(BuildKnownPlainText(object, standIn.length)).toBe(standIn);
  });

  it('rejects a definition shorter than the stand-in', () => {
    try {
      BuildKnownPlainText(object, 10);
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(DecryptionLengthError);
      if (err instanceof DecryptionLengthError) {
        expect(err.ObjectName).toBe('[dbo].[usp_Payroll]');
        expect(err.RequiredLength).toBe(standIn.length);
        expect(err.ActualLength).toBe(10);
        expect(err.message).toBe(
          `Encrypted definition of [dbo].[usp_Payroll] is 10 characters, shorter than the ` +
            `${standIn.length}-character stand-in needed to recover it`
        );
      }
    }
  });
});
