/**
 * @module decrypt/export
 * Writes recovered definitions to disk, one `.sql` file per object.
 */

import * as fs from 'fs';
import * as path from 'path';
import { EncryptedObject } from './types';

/**
 * Replaces characters that are not allowed in file or directory names.
 */
export function SafePathSegment(segment: string): string {
  return segment.replace(/[\\/:*?"<>|]/g, '_');
}

/**
 * Returns the file a definition is exported to:
 * `<destination>/<server>/<database>/<schema>.<name>.sql`.
 */
export function GetExportPath(destination: string, server: string, object: EncryptedObject): string {
  return path.join(
    destination,
    SafePathSegment(server),
    SafePathSegment(object.Database),
    `${SafePathSegment(object.Schema)}.${SafePathSegment(object.Name)}.sql`
  );
}

/**
 * Writes a recovered definition, creating directories as needed.
 * An existing file is overwritten.
 *
 * @returns The path written to
 */
export function ExportDefinition(
  destination: string,
  server: string,
  object: EncryptedObject,
  definition: string
): string {
  const filePath = GetExportPath(destination, server, object);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, definition, 'utf-8');
  return filePath;
}
