/**
 * Execute queries from CLI
 */

import chalk from 'chalk';
import type { Variables } from '../types/models.js';
import * as logger from './logger.js';
import { withClient } from './client.js';

export async function runQuery(
  source: string,
  options: { format: 'json' | 'table'; cache: boolean; var?: Variables }
): Promise<void> {
  await withClient('Query failed', async (client, spinner) => {
    spinner.start('Executing query...');
    const startTime = Date.now();
    const result = await client.fetchData(source, options.var ?? {}, options.cache);
    spinner.succeed(`Query complete (${result.rows.length} rows in ${Date.now() - startTime}ms)`);
    console.log(chalk.gray(`Cache: ${options.cache ? 'enabled' : chalk.yellow('bypassed')}\n`));

    if (options.format === 'json') {
      logger.printJson(result);
    } else {
      logger.printTable(result);
    }
  });
}
