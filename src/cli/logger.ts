/**
 * CLI output helpers with colors and formatting.
 */

import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import type { CellValue, TabularResult } from '../types/models.js';

/**
 * Success message.
 */
export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Error message, with the first suggestion when the error carries any.
 */
export function error(message: string, suggestion?: string): void {
  console.error(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.error(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

/**
 * Warning message.
 */
export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

/**
 * Info message.
 */
export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

/**
 * Create a spinner.
 */
export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

/**
 * Render one cell for display.
 */
export function formatCell(value: CellValue): string {
  if (value === null) return chalk.dim('NULL');
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Print a result as a table.
 */
export function printTable(result: TabularResult): void {
  const table = new Table({
    head: result.columns.map((column) => chalk.bold(column.name)),
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });

  for (const row of result.rows) {
    table.push(result.columns.map((column) => formatCell(row[column.name] ?? null)));
  }

  console.log(table.toString());
}

/**
 * Print a result as JSON rows.
 */
export function printJson(result: TabularResult): void {
  console.log(JSON.stringify(result.rows, null, 2));
}
