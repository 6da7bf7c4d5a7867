/**
 * @module commands/index-info
 * Implementation of the `sqlsteward index-info` CLI command.
 */

import { IndexInfoOptions, SqlSteward, SqlStewardConfig } from '@sqlsteward/core';
import { LogError, LogInfo, PrintIndexTable } from '../formatting';

/**
 * Executes the index-info command: prints index and statistics metadata.
 *
 * @param config - Resolved SqlSteward configuration
 * @param options - Databases and object filter
 */
export async function RunIndexInfo(config: SqlStewardConfig, options: IndexInfoOptions): Promise<boolean> {
  const steward = new SqlSteward(config);

  try {
    const databases = options.Databases ?? [config.Database.Database];
    LogInfo(`Server: ${config.Database.Server}:${config.Database.Port ?? 1433}`);

    for (const database of databases) {
      console.log();
      LogInfo(`Database: ${database}`);
      console.log();
      const indexes = await steward.GetIndexInfo({ ...options, Databases: [database] });
      PrintIndexTable(indexes);
    }

    return true;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  } finally {
    await steward.Close();
  }
}
