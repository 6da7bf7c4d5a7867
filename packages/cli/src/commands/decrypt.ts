/**
 * @module commands/decrypt
 * Implementation of the `sqlsteward decrypt` CLI command.
 */

import { DecryptObjectsOptions, SqlSteward, SqlStewardConfig } from '@sqlsteward/core';
import { LogInfo, LogObjectDecrypted, LogWarning, PrintDecryptSummary, PrintDefinition } from '../formatting';

/**
 * Executes the decrypt command: recovers the definitions of objects created
 * `WITH ENCRYPTION` over the Dedicated Admin Connection.
 *
 * Recovered definitions are written to the export directory when one is
 * configured, and printed otherwise.
 *
 * @param config - Resolved SqlSteward configuration
 * @param options - Databases, object filter and decryption settings
 */
export async function RunDecrypt(config: SqlStewardConfig, options: DecryptObjectsOptions): Promise<boolean> {
  const steward = new SqlSteward(config);
  steward.OnProgress({ OnLog: LogInfo, OnObjectDecrypted: LogObjectDecrypted });

  const databases = options.Databases ?? [config.Database.Database];
  const exportDestination = options.ExportDestination ?? config.Decrypt?.ExportDestination ?? null;
  const dacPort = options.DacPort ?? config.Decrypt?.DacPort ?? 1434;

  try {
    LogInfo(`Server: ${config.Database.Server} (dedicated admin connection on port ${dacPort})`);
    LogInfo(`Databases: ${databases.join(', ')}`);
    LogInfo(`Encoding: ${options.Encoding ?? config.Decrypt?.Encoding ?? 'ascii'}`);
    if (exportDestination) {
      LogInfo(`Export: ${exportDestination}`);
    } else {
      LogWarning('No export directory set; recovered definitions are printed below');
    }
    console.log();

    const result = await steward.DecryptObjects({ ...options, Databases: databases });

    if (!exportDestination) {
      for (const objectResult of result.Results) {
        PrintDefinition(objectResult);
      }
    }

    PrintDecryptSummary(result.Decrypted, result.Failed, result.Errors);
    return result.Success;
  } finally {
    await steward.Close();
  }
}
