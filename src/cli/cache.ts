/**
 * Local cache management from CLI. Needs no warehouse connection.
 */

import { loadConfig } from '../config.js';
import { ParquetCache } from '../services/cache/index.js';
import { resolveQuery } from '../services/query-source.js';
import * as logger from './logger.js';
import { reportError } from './client.js';

export async function runCacheList(): Promise<void> {
  try {
    const config = loadConfig();
    const cache = new ParquetCache(config.cacheDir);
    const keys = await cache.keys();

    if (keys.length === 0) {
      logger.info(`No cached results in ${config.cacheDir}`);
      return;
    }
    for (const key of keys) {
      console.log(cache.path(key));
    }
  } catch (error) {
    reportError(error);
    process.exitCode = 1;
  }
}

export async function runCacheClear(source?: string): Promise<void> {
  try {
    const config = loadConfig();
    const cache = new ParquetCache(config.cacheDir);

    if (source === undefined) {
      const removed = await cache.clear();
      logger.success(`Removed ${removed} cached result${removed === 1 ? '' : 's'}`);
      return;
    }

    const resolved = await resolveQuery(source, { sqlRoot: config.sqlRoot });
    if (await cache.delete(resolved.cacheKey)) {
      logger.success(`Removed ${cache.path(resolved.cacheKey)}`);
    } else {
      logger.warn(`No cached result for ${source}`);
    }
  } catch (error) {
    reportError(error);
    process.exitCode = 1;
  }
}
