/**
 * @module decrypt/decryptor
 * Recovers encrypted definitions one object at a time.
 *
 * Each object is handled in isolation: a failure (missing permission,
 * object dropped mid-run, stand-in too long, failed rollback) becomes a
 * failed `DecryptionResult` naming the object, and the batch moves on.
 */

import { DecryptionError, toError } from '../core/errors';
import { ObjectName, ParseObjectName, QualifiedName, QuoteName } from '../db/identifiers';
import { ExportDefinition } from './export';
import { DecryptWithKnownPlaintext, EncodeKnownPlain } from './known-plaintext';
import { BuildKnownPlainText } from './templates';
import {
  DecryptionResult,
  DefinitionEncoding,
  EncryptedDefinitionStore,
  EncryptedObject,
} from './types';

/**
 * Options for an `ObjectDecryptor`.
 */
export interface ObjectDecryptorOptions {
  /** Encoding shared by the real and stand-in definitions */
  Encoding: DefinitionEncoding;

  /** Directory to export recovered definitions into. Nothing is written when null */
  ExportDestination?: string | null;

  /** Server label used as the top-level export directory */
  Server?: string;

  /** Called after each object, whether or not it was recovered */
  OnObjectDecrypted?: (result: DecryptionResult) => void;

  /** Called for informational log messages */
  OnLog?: (message: string) => void;
}

/**
 * Recovers encrypted definitions through an `EncryptedDefinitionStore`.
 *
 * @example
 * ```typescript
 * const decryptor = new ObjectDecryptor(store, { Encoding: 'ascii' });
 * const objects = await store.ListEncryptedObjects();
 * for (const result of await decryptor.DecryptObjects(objects)) {
 *   console.log(result.Object.Name, result.Success);
 * }
 * ```
 */
export class ObjectDecryptor {
  private readonly store: EncryptedDefinitionStore;
  private readonly options: ObjectDecryptorOptions;

  constructor(store: EncryptedDefinitionStore, options: ObjectDecryptorOptions) {
    this.store = store;
    this.options = options;
  }

  /**
   * Recovers a single definition.
   *
   * 1. Read the encrypted blob of the real definition
   * 2. Build a stand-in definition of the same length
   * 3. Apply the stand-in inside a rolled-back transaction and read its blob
   * 4. XOR the three byte sequences together
   *
   * @throws DecryptionError (or a subclass) naming the object
   */
  async DecryptObject(object: EncryptedObject): Promise<string> {
    const name = QualifiedName(object);
    const encoding = this.options.Encoding;

    try {
      const secret = await this.store.ReadSecret(object);
      const knownPlainText = BuildKnownPlainText(object, Math.ceil(secret.length / 2));
      const knownSecret = await this.store.ReadKnownSecret(object, knownPlainText);
      return DecryptWithKnownPlaintext(
        secret,
        EncodeKnownPlain(knownPlainText),
        knownSecret,
        encoding,
        name
      );
    } catch (err) {
      if (err instanceof DecryptionError) {
        throw err;
      }
      throw new DecryptionError(
        name,
        `Failed to decrypt ${name} in ${QuoteName(object.Database)}: ${toError(err).message}`,
        toError(err)
      );
    }
  }

  /**
   * Recovers every object in order. Never throws for a single object;
   * each failure is reported in its result.
   */
  async DecryptObjects(objects: EncryptedObject[]): Promise<DecryptionResult[]> {
    const results: DecryptionResult[] = [];

    for (const object of objects) {
      const result = await this.decryptAndExport(object);
      results.push(result);
      this.options.OnObjectDecrypted?.(result);
    }

    return results;
  }

  private async decryptAndExport(object: EncryptedObject): Promise<DecryptionResult> {
    const name = QualifiedName(object);

    let definition: string;
    try {
      definition = await this.DecryptObject(object);
    } catch (err) {
      this.options.OnLog?.(`Could not decrypt ${name}: ${toError(err).message}`);
      return { Object: object, Success: false, Error: toError(err) };
    }

    const destination = this.options.ExportDestination ?? null;
    if (destination === null) {
      return { Object: object, Success: true, Definition: definition };
    }

    // A failed write still hands back the recovered text.
    try {
      const exportPath = ExportDefinition(destination, this.options.Server ?? 'localhost', object, definition);
      this.options.OnLog?.(`Exported ${name} to ${exportPath}`);
      return { Object: object, Success: true, Definition: definition, ExportPath: exportPath };
    } catch (err) {
      this.options.OnLog?.(`Could not export ${name}: ${toError(err).message}`);
      return { Object: object, Success: false, Definition: definition, Error: toError(err) };
    }
  }
}

/**
 * Keeps only the objects named in `names` (case-insensitive). Every object
 * is kept when `names` is empty or undefined. One-part names match any schema.
 */
export function FilterObjects(objects: EncryptedObject[], names?: string[]): EncryptedObject[] {
  if (!names || names.length === 0) {
    return objects;
  }

  const wanted = names.map((n) => parseFilterName(n));
  return objects.filter((object) =>
    wanted.some(
      (w) =>
        equalsIgnoreCase(w.Name, object.Name) &&
        (w.Schema === null || equalsIgnoreCase(w.Schema, object.Schema))
    )
  );
}

function parseFilterName(input: string): { Schema: string | null; Name: string } {
  const parsed: ObjectName = ParseObjectName(input, '');
  return { Schema: parsed.Schema === '' ? null : parsed.Schema, Name: parsed.Name };
}

function equalsIgnoreCase(a: string, b: string): boolean {
  return a.localeCompare(b, undefined, { sensitivity: 'accent' }) === 0;
}
