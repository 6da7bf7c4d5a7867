/**
 * @module commands/write-table
 * Implementation of the `sqlsteward write-table` CLI command.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Row, SqlSteward, SqlStewardConfig, WriteTableDataOptions } from '@sqlsteward/core';
import { LogError, LogInfo, LogRowsCopied, LogWarning, PrintCopySummary } from '../formatting';

/**
 * Executes the write-table command: bulk-writes the rows of a JSON file
 * into a table, optionally creating it.
 *
 * @param config - Resolved SqlSteward configuration
 * @param file - JSON file holding an array of row objects
 * @param options - Destination and bulk copy flags
 */
export async function RunWriteTable(
  config: SqlStewardConfig,
  file: string,
  options: Omit<WriteTableDataOptions, 'Rows'>
): Promise<boolean> {
  let rows: Row[];
  try {
    rows = ReadRowsFile(path.resolve(file));
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  }

  if (rows.length === 0) {
    LogWarning(`${file} contains no rows; nothing to write`);
    return true;
  }

  const steward = new SqlSteward(config);
  steward.OnProgress({ OnLog: LogInfo, OnRowsCopied: LogRowsCopied });

  try {
    LogInfo(`Database: ${config.Database.Server}:${config.Database.Port ?? 1433}/${options.Database ?? config.Database.Database}`);
    LogInfo(`Input: ${file} (${rows.length} row(s))`);
    console.log();

    const result = await steward.WriteTableData({ ...options, Rows: rows });
    PrintCopySummary(result);
    return result.Success;
  } finally {
    await steward.Close();
  }
}

/**
 * Reads a JSON array of row objects from disk.
 * @throws Error when the file is missing, not JSON, or not an array of objects
 */
export function ReadRowsFile(filePath: string): Row[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Input file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new Error(`Input file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new Error(`Input file ${filePath} must contain a JSON array of row objects`);
  }

  const rows: Row[] = [];
  parsed.forEach((item: unknown, index: number) => {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      throw new Error(`Row ${index + 1} of ${filePath} is not an object`);
    }
    rows.push({ ...item });
  });
  return rows;
}
