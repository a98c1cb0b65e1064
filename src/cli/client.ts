/**
 * Shared connection handling for CLI commands.
 */

import { QueryCacheClient } from '../QueryCacheClient.js';
import * as logger from './logger.js';

/**
 * Connect, run `fn`, and always close the session afterwards.
 * Failures, including a failed close, are printed and end the process with
 * exit code 1.
 */
export async function withClient(
  failureText: string,
  fn: (client: QueryCacheClient, spinner: ReturnType<typeof logger.spinner>) => Promise<void>,
  connect: () => Promise<QueryCacheClient> = () => QueryCacheClient.connect()
): Promise<void> {
  const spinner = logger.spinner('Connecting to Snowflake...');
  let client: QueryCacheClient | undefined;

  try {
    client = await connect();
    spinner.succeed('Connected');
    await fn(client, spinner);
  } catch (error) {
    spinner.fail(failureText);
    reportError(error);
    process.exitCode = 1;
  } finally {
    if (client) {
      try {
        await client.close();
      } catch (error) {
        reportError(error);
        process.exitCode = 1;
      }
    }
  }
}

/**
 * Print an error, with its first suggestion when it has any.
 */
export function reportError(error: unknown): void {
  if (error instanceof Error) {
    const suggestions: unknown = Reflect.get(error, 'suggestions');
    const [first] = Array.isArray(suggestions) ? suggestions : [];
    logger.error(error.message.split('\n')[0], typeof first === 'string' ? first : undefined);
    return;
  }
  logger.error(String(error));
}
