/**
 * @module decrypt/templates
 * Minimal stand-in definitions used as known plaintext.
 *
 * A stand-in must be a valid `ALTER ... WITH ENCRYPTION` for the same
 * object, and exactly as long as the real definition. Templates are kept
 * as short as each object kind allows and then left-padded with spaces.
 */

import { DecryptionError, DecryptionLengthError } from '../core/errors';
import { QualifiedName } from '../db/identifiers';
import { EncryptedObject } from './types';

/**
 * Builds the unpadded stand-in definition for an object.
 *
 * @throws DecryptionError for a trigger without a parent table
 */
export function BuildStandInDefinition(object: EncryptedObject): string {
  const name = QualifiedName(object);

  switch (object.Type) {
    case 'P':
      return `ALTER PROCEDURE ${name} WITH ENCRYPTION AS RETURN 0;`;
    case 'FN':
      return `ALTER FUNCTION ${name}() RETURNS INT WITH ENCRYPTION AS BEGIN RETURN 0 END;`;
    case 'IF':
      return `ALTER FUNCTION ${name}() RETURNS TABLE WITH ENCRYPTION AS RETURN SELECT 0 AS c;`;
    case 'TF':
      return `ALTER FUNCTION ${name}() RETURNS @t TABLE (c INT) WITH ENCRYPTION AS BEGIN RETURN END;`;
    case 'V':
      return `ALTER VIEW ${name} WITH ENCRYPTION AS SELECT 0 AS c;`;
    case 'TR': {
      if (object.ParentSchema === null || object.ParentName === null) {
        throw new DecryptionError(name, `Trigger ${name} has no parent table`);
      }
      const parent = QualifiedName({ Schema: object.ParentSchema, Name: object.ParentName });
      return `ALTER TRIGGER ${name} ON ${parent} WITH ENCRYPTION FOR INSERT AS RETURN;`;
    }
    default:
      return assertNever(object.Type, name);
  }
}

/**
 * Builds the known plaintext for an object: its stand-in definition,
 * left-padded with spaces to `length` characters.
 *
 * @param object - Object being recovered
 * @param length - Length of the real definition, in characters
 * @throws DecryptionLengthError if the stand-in is longer than `length`
 */
export function BuildKnownPlainText(object: EncryptedObject, length: number): string {
  const standIn = BuildStandInDefinition(object);
  if (standIn.length > length) {
    const name = QualifiedName(object);
    throw new DecryptionLengthError(
      name,
      `Encrypted definition of ${name} is ${length} characters, shorter than the ` +
        `${standIn.length}-character stand-in needed to recover it`,
      standIn.length,
      length
    );
  }
  return standIn.padStart(length, ' ');
}

function assertNever(type: never, name: string): never {
  throw new DecryptionError(name, `Unsupported object type "${String(type)}" for ${name}`);
}
