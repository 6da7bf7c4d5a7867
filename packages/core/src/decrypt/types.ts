/**
 * @module decrypt/types
 * Type definitions for recovering encrypted object definitions.
 */

/**
 * Text encoding used to turn an object definition into bytes and back.
 * Must match on the real-object and known-object sides of a decryption,
 * or the recovered text is garbage.
 */
export type DefinitionEncoding = 'ascii' | 'utf8';

/**
 * `sys.objects.type` codes of the object kinds that can be created
 * `WITH ENCRYPTION` and recovered.
 *
 * - `'P'`: Stored procedure
 * - `'FN'`: Scalar function
 * - `'IF'`: Inline table-valued function
 * - `'TF'`: Multi-statement table-valued function
 * - `'V'`: View
 * - `'TR'`: DML trigger
 */
export type EncryptedObjectType = 'P' | 'FN' | 'IF' | 'TF' | 'V' | 'TR';

/** All recoverable object kinds */
export const ENCRYPTED_OBJECT_TYPES: readonly EncryptedObjectType[] = ['P', 'FN', 'IF', 'TF', 'V', 'TR'];

/**
 * An object whose definition is stored encrypted.
 */
export interface EncryptedObject {
  /** Database the object lives in */
  Database: string;

  /** Owning schema */
  Schema: string;

  /** Object name */
  Name: string;

  /** Object kind */
  Type: EncryptedObjectType;

  /** Schema of the table a trigger is attached to (null for other kinds) */
  ParentSchema: string | null;

  /** Name of the table a trigger is attached to (null for other kinds) */
  ParentName: string | null;
}

/**
 * Outcome of recovering one object.
 */
export interface DecryptionResult {
  /** The object that was processed */
  Object: EncryptedObject;

  /** Whether the definition was recovered */
  Success: boolean;

  /** Recovered definition text, kept even when the export fails */
  Definition?: string;

  /** File the definition was written to, when exporting */
  ExportPath?: string;

  /** Why recovery failed */
  Error?: Error;
}

/**
 * Catalog access needed by the decryptor. Implemented over `mssql` by
 * `SqlDefinitionStore`; one store serves one database.
 */
export interface EncryptedDefinitionStore {
  /** Lists every user object in the database whose definition is encrypted */
  ListEncryptedObjects(): Promise<EncryptedObject[]>;

  /** Reads the raw encrypted definition blob of the object */
  ReadSecret(object: EncryptedObject): Promise<Buffer>;

  /**
   * Temporarily replaces the object's definition with `knownPlainText`,
   * reads back the resulting encrypted blob, and undoes the change.
   */
  ReadKnownSecret(object: EncryptedObject, knownPlainText: string): Promise<Buffer>;
}
