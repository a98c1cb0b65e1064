/**
 * Export rows from a JSON file to a warehouse table
 */

import * as logger from './logger.js';
import { withClient } from './client.js';
import { readRowsFile } from './options.js';

export async function runExport(
  table: string,
  options: { database: string; schema: string; input: string; replace?: boolean }
): Promise<void> {
  await withClient('Export failed', async (client, spinner) => {
    const rows = await readRowsFile(options.input);

    spinner.start(`Writing ${rows.length} rows to ${options.schema}.${table}...`);
    const result = await client.exportData({
      table,
      database: options.database,
      schema: options.schema,
      rows,
      append: !options.replace,
    });

    if (!result.success) {
      spinner.fail(`Failed to write rows: ${result.error ?? 'unknown error'}`);
      process.exitCode = 1;
      return;
    }

    spinner.succeed(`Wrote ${result.rowCount} rows to ${options.schema}.${table}`);
    if (result.created) {
      logger.info(`Created table ${options.schema}.${table}`);
    }
  });
}
