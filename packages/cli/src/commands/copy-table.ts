/**
 * @module commands/copy-table
 * Implementation of the `sqlsteward copy-table` CLI command.
 */

import { SqlSteward, SqlStewardConfig, CopyTableDataOptions } from '@sqlsteward/core';
import { LogInfo, LogRowsCopied, PrintCopySummary } from '../formatting';

/**
 * Executes the copy-table command: bulk-copies rows from a table or query
 * into a destination table.
 *
 * @param config - Resolved SqlSteward configuration
 * @param options - Source, destination and bulk copy flags
 * @param quiet - When true, suppress per-batch output
 */
export async function RunCopyTable(
  config: SqlStewardConfig,
  options: CopyTableDataOptions,
  quiet: boolean = false
): Promise<boolean> {
  const steward = new SqlSteward(config);

  steward.OnProgress({
    OnLog: LogInfo,
    OnRowsCopied: quiet ? undefined : LogRowsCopied,
  });

  try {
    LogInfo(`Database: ${config.Database.Server}:${config.Database.Port ?? 1433}/${config.Database.Database}`);
    if (options.DestinationConnection) {
      LogInfo(`Destination server: ${options.DestinationConnection.Server}:${options.DestinationConnection.Port ?? 1433}`);
    }
    console.log();

    const result = await steward.CopyTableData(options);
    PrintCopySummary(result);
    return result.Success;
  } finally {
    await steward.Close();
  }
}
