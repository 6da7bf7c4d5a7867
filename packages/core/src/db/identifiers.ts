/**
 * @module db/identifiers
 * T-SQL identifier quoting and schema-qualified name parsing.
 */

import { SqlStewardError } from '../core/errors';

/**
 * A schema-qualified object name.
 */
export interface ObjectName {
  Schema: string;
  Name: string;
}

/**
 * Wraps an identifier in brackets, doubling any closing bracket.
 * Equivalent to T-SQL `QUOTENAME(identifier)`.
 *
 * @example
 * ```typescript
 * QuoteName('Order Details'); // "[Order Details]"
 * QuoteName('odd]name');      // "[odd]]name]"
 * ```
 */
export function QuoteName(identifier: string): string {
  return `[${identifier.replace(/]/g, ']]')}]`;
}

/**
 * Formats an object name as `[schema].[name]`.
 */
export function QualifiedName(name: ObjectName): string {
  return `${QuoteName(name.Schema)}.${QuoteName(name.Name)}`;
}

/**
 * Parses `name`, `schema.name`, or bracketed forms such as
 * `[my schema].[my.table]` into its parts.
 *
 * @param input - Object name as typed by the user
 * @param defaultSchema - Schema used when the input has only one part
 * @throws SqlStewardError (`INVALID_OBJECT_NAME`) on empty or malformed input
 */
export function ParseObjectName(input: string, defaultSchema: string = 'dbo'): ObjectName {
  const parts = splitIdentifierParts(input.trim(), input);

  if (parts.length === 1) {
    return { Schema: defaultSchema, Name: parts[0] };
  }
  if (parts.length === 2) {
    return { Schema: parts[0], Name: parts[1] };
  }
  throw invalidName(input, 'expected at most two parts (schema.name)');
}

function splitIdentifierParts(text: string, original: string): string[] {
  if (text.length === 0) {
    throw invalidName(original, 'name is empty');
  }

  const parts: string[] = [];
  let current = '';
  let inBrackets = false;
  let partStarted = false;
  let closed = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inBrackets) {
      if (ch === ']') {
        if (text[i + 1] === ']') {
          current += ']';
          i++;
        } else {
          inBrackets = false;
          closed = true;
        }
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '[') {
      if (partStarted) {
        throw invalidName(original, `unexpected "[" at position ${i + 1}`);
      }
      inBrackets = true;
      partStarted = true;
    } else if (ch === '.') {
      if (!partStarted || current.length === 0) {
        throw invalidName(original, 'empty name part');
      }
      parts.push(current);
      current = '';
      partStarted = false;
      closed = false;
    } else {
      // only a separator may follow a closing bracket
      if (closed) {
        throw invalidName(original, `unexpected "${ch}" after "]" at position ${i + 1}`);
      }
      current += ch;
      partStarted = true;
    }
  }

  if (inBrackets) {
    throw invalidName(original, 'unterminated "["');
  }
  if (current.length === 0) {
    throw invalidName(original, 'empty name part');
  }
  parts.push(current);
  return parts;
}

function invalidName(input: string, reason: string): SqlStewardError {
  return new SqlStewardError('INVALID_OBJECT_NAME', `Invalid object name "${input}": ${reason}`);
}
