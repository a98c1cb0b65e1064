/**
 * Run SQL files from CLI
 */

import type { Variables } from '../types/models.js';
import { withClient } from './client.js';

export async function runExec(file: string, options: { var?: Variables }): Promise<void> {
  await withClient('SQL file failed', async (client, spinner) => {
    spinner.start(`Executing ${file}...`);
    const count = await client.executeSql(file, options.var ?? {});
    spinner.succeed(`Executed ${count} statement${count === 1 ? '' : 's'}`);
  });
}
