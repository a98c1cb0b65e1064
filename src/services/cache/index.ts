/**
 * Result cache exports.
 */

export { ParquetCache, CACHE_FILE_EXTENSION } from './parquet.js';
export type { ResultCache } from './types.js';
