/**
 * Drop tables from CLI
 */

import { withClient } from './client.js';

export async function runDrop(database: string, schema: string, table: string): Promise<void> {
  await withClient('Drop failed', async (client, spinner) => {
    spinner.start(`Dropping ${schema}.${table}...`);
    const dropped = await client.dropTable(database, schema, table);
    if (dropped) {
      spinner.succeed(`Table ${schema}.${table} dropped`);
    } else {
      spinner.info(`Table ${schema}.${table} does not exist`);
    }
  });
}
