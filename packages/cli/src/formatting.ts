/**
 * @module formatting
 * Console output formatting for the SqlSteward CLI.
 * Provides colored, structured output for copy progress, recovered
 * definitions and index reports.
 */

import chalk from 'chalk';
import { DecryptionResult, IndexInfo, RowsCopiedNotification, TableCopyResult } from '@sqlsteward/core';

/**
 * Prints the SqlSteward banner to the console.
 */
export function PrintBanner(): void {
  console.log(chalk.cyan.bold('\n  SqlSteward') + chalk.gray(': SQL Server administration from TypeScript'));
  console.log(chalk.gray('  ─────────────────────────────────────────\n'));
}

/**
 * Logs an informational message.
 */
export function LogInfo(message: string): void {
  console.log(chalk.gray('  ') + message);
}

/**
 * Logs a success summary.
 */
export function LogSuccess(message: string): void {
  console.log(chalk.green('\n  ' + message));
}

/**
 * Logs a warning.
 */
export function LogWarning(message: string): void {
  console.log(chalk.yellow('  WARNING: ' + message));
}

/**
 * Logs an error message.
 */
export function LogError(message: string): void {
  console.log(chalk.red('\n  ERROR: ' + message));
}

/**
 * Logs one bulk copy batch.
 */
export function LogRowsCopied(notification: RowsCopiedNotification): void {
  console.log(
    chalk.gray('  ') +
      chalk.white(`Batch ${notification.Batch}: ${formatCount(notification.Total)} row(s) copied`) +
      chalk.gray(` (${formatCount(notification.RowsPerSecond)} rows/s, ${formatElapsed(notification.ElapsedMS)})`)
  );
}

/**
 * Logs the outcome of one object in a decryption run.
 */
export function LogObjectDecrypted(result: DecryptionResult): void {
  const name = `${result.Object.Database}.${result.Object.Schema}.${result.Object.Name}`;
  if (result.Success) {
    console.log(chalk.gray('  ') + chalk.white(name) + chalk.green(' OK'));
  } else {
    console.log(chalk.gray('  ') + chalk.white(name) + chalk.red(' FAILED'));
    if (result.Error) {
      console.log(chalk.red(`    ${result.Error.message}`));
    }
  }
}

/**
 * Prints a recovered definition between separator lines.
 */
export function PrintDefinition(result: DecryptionResult): void {
  if (!result.Definition) {
    return;
  }
  console.log(chalk.gray(`\n  -- ${result.Object.Database}.${result.Object.Schema}.${result.Object.Name}`));
  console.log(result.Definition);
  console.log(chalk.gray('  ' + '─'.repeat(50)));
}

/**
 * Formats an index metadata table for the `index-info` command.
 */
export function PrintIndexTable(indexes: IndexInfo[]): void {
  if (indexes.length === 0) {
    console.log(chalk.yellow('  No indexes found.'));
    return;
  }

  console.log(
    chalk.gray('  ') +
      padRight('Object', 32) +
      padRight('Index', 32) +
      padRight('Type', 14) +
      padRight('Keys', 30) +
      padLeft('Rows', 12) +
      padLeft('Seeks', 10) +
      padLeft('Scans', 10) +
      '  Stats updated'
  );
  console.log(chalk.gray('  ' + '─'.repeat(155)));

  for (const index of indexes) {
    const flags = [index.IsPrimaryKey ? 'PK' : '', index.IsUnique && !index.IsPrimaryKey ? 'UQ' : '']
      .filter((f) => f !== '')
      .join(',');
    const type = flags ? `${index.IndexType} ${flags}` : index.IndexType;
    const typeColor = index.IsDisabled ? chalk.red : chalk.white;

    console.log(
      '  ' +
        padRight(truncate(`${index.Schema}.${index.Object}`, 30), 32) +
        padRight(truncate(index.Index ?? '(heap)', 30), 32) +
        typeColor(padRight(truncate(type, 13), 14)) +
        padRight(truncate(index.KeyColumns.join(', '), 28), 30) +
        padLeft(formatCount(index.RowCount), 12) +
        padLeft(formatCount(index.UserSeeks), 10) +
        padLeft(formatCount(index.UserScans), 10) +
        chalk.gray('  ' + (index.StatsLastUpdated?.toISOString() ?? '-'))
    );
  }
  console.log();
}

/**
 * Prints a summary banner after a copy or write operation.
 */
export function PrintCopySummary(result: TableCopyResult): void {
  console.log();
  console.log(chalk.gray('  ' + '─'.repeat(50)));

  if (result.Success) {
    console.log(
      chalk.green.bold('  SUCCESS') +
        chalk.gray(`: ${formatCount(result.RowsCopied)} row(s) copied in ${formatElapsed(result.ElapsedMS)}`)
    );
    console.log(chalk.gray('  From: ') + chalk.white(result.Source));
    console.log(chalk.gray('  To:   ') + chalk.white(result.Destination));
  } else {
    console.log(
      chalk.red.bold('  FAILED') +
        chalk.gray(`: ${formatCount(result.RowsCopied)} row(s) copied before failure`)
    );
    if (result.ErrorMessage) {
      console.log(chalk.red(`  ${result.ErrorMessage}`));
    }
  }

  console.log(chalk.gray('  ' + '─'.repeat(50)));
  console.log();
}

/**
 * Prints a summary banner after a decryption run.
 */
export function PrintDecryptSummary(decrypted: number, failed: number, errors: string[]): void {
  console.log();
  console.log(chalk.gray('  ' + '─'.repeat(50)));

  if (failed === 0 && errors.length === 0) {
    console.log(chalk.green.bold('  SUCCESS') + chalk.gray(`: ${decrypted} definition(s) recovered`));
  } else {
    console.log(
      chalk.red.bold('  FAILED') + chalk.gray(`: ${decrypted} recovered, ${failed} failed`)
    );
    for (const error of errors) {
      console.log(chalk.red(`  ${error}`));
    }
  }

  console.log(chalk.gray('  ' + '─'.repeat(50)));
  console.log();
}

/**
 * Formats elapsed time in a human-readable way.
 */
export function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

/**
 * Formats a count with thousands separators.
 */
export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * Right-pads a string to a given width.
 */
function padRight(str: string, width: number): string {
  return str.length >= width ? str : str + ' '.repeat(width - str.length);
}

function padLeft(str: string, width: number): string {
  return str.length >= width ? str : ' '.repeat(width - str.length) + str;
}

/**
 * Truncates a string to a maximum length, appending '...' if needed.
 */
function truncate(str: string, maxLen: number): string {
  return str.length <= maxLen ? str : str.substring(0, maxLen - 3) + '...';
}
