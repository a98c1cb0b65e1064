/**
 * snowcache - cached Snowflake queries and table export
 */

export { QueryCacheClient, TABLE_EXISTS_SQL } from './QueryCacheClient.js';
export type { QueryCacheClientOptions } from './QueryCacheClient.js';
export { loadConfig } from './config.js';
export type { WarehouseConfig, ConfigOverrides, LogLevel } from './config.js';
export { createLogger, silentLogger } from './utils/logger.js';
export { ParquetCache } from './services/cache/index.js';
export type { ResultCache } from './services/cache/index.js';
export { connectWarehouse, SnowflakeSession, loadPrivateKey } from './services/warehouse/index.js';
export type { WarehouseSession, BindValue } from './services/warehouse/index.js';
export { resolveQuery, hashQuery } from './services/query-source.js';
export { substituteVariables, splitStatements } from './services/variables.js';
export { inferColumnType, toWarehouseType, buildCreateTable } from './services/schema-inference.js';
export type {
  CellValue,
  Column,
  ColumnType,
  Row,
  TabularResult,
  Variables,
  VariableValue,
  QuerySource,
  BulkWriteResult,
  ExportOptions,
  ExportResult,
} from './types/models.js';
export {
  ConfigurationError,
  QueryValidationError,
  SqlFileNotFoundError,
  MissingVariableError,
  CacheError,
} from './types/errors.js';
