/**
 * @module decrypt/known-plaintext
 * Known-plaintext recovery of definitions encrypted with SQL Server's
 * legacy `WITH ENCRYPTION` scheme.
 *
 * The server XORs a definition's 16-bit code units with a keystream that
 * is reused for any definition of the same object. Encrypting a second,
 * known text of the same length therefore exposes the keystream:
 *
 *   keystream = KnownSecret XOR KnownPlain
 *   plain     = Secret XOR keystream
 *
 * Only the low byte of each code unit is recovered, so the loop steps by 2.
 */

import { DecryptionLengthError } from '../core/errors';
import { DefinitionEncoding } from './types';

/**
 * Lays out known plaintext the way the server stores it before
 * encryption: one little-endian 16-bit code unit per UTF-16 code unit of
 * `text`, whatever encoding the recovered text is later decoded with.
 * The result is always `2 * text.length` bytes, so a stand-in padded to
 * the definition's length lines up with the encrypted blob unit for unit.
 *
 * @example
 * ```typescript
 * EncodeKnownPlain('AB'); // <Buffer 41 00 42 00>
 * EncodeKnownPlain('ä');  // <Buffer e4 00>
 * ```
 */
export function EncodeKnownPlain(text: string): Buffer {
  return Buffer.from(text, 'utf16le');
}

/**
 * Recovers the plaintext of `secret` from a known plaintext/ciphertext
 * pair produced for the same object.
 *
 * For each even byte position `i`, the recovered byte is
 * `secret[i] ^ knownPlain[i] ^ knownSecret[i]`. The recovered bytes are
 * decoded with `encoding`, which must match the encoding the real
 * definition's characters fit in.
 *
 * @param secret - Encrypted blob of the real definition
 * @param knownPlain - Known plaintext, laid out by `EncodeKnownPlain`
 * @param knownSecret - Encrypted blob of the known plaintext
 * @param encoding - Encoding the recovered low bytes are decoded with
 * @param objectName - Object the blobs belong to, for error messages
 * @throws DecryptionLengthError if `knownPlain` or `knownSecret` is shorter than `secret`
 */
export function DecryptWithKnownPlaintext(
  secret: Uint8Array,
  knownPlain: Uint8Array,
  knownSecret: Uint8Array,
  encoding: DefinitionEncoding,
  objectName: string = '(unnamed object)'
): string {
  if (knownPlain.length < secret.length) {
    throw new DecryptionLengthError(
      objectName,
      `Known plaintext for ${objectName} is ${knownPlain.length} bytes but the encrypted definition is ${secret.length}`,
      secret.length,
      knownPlain.length
    );
  }
  if (knownSecret.length < secret.length) {
    throw new DecryptionLengthError(
      objectName,
      `Known ciphertext for ${objectName} is ${knownSecret.length} bytes but the encrypted definition is ${secret.length}`,
      secret.length,
      knownSecret.length
    );
  }

  const plain = Buffer.alloc(Math.ceil(secret.length / 2));
  for (let i = 0; i < secret.length; i += 2) {
    plain[i / 2] = secret[i] ^ knownPlain[i] ^ knownSecret[i];
  }
  return plain.toString(encoding);
}
