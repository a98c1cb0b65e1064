export { connectWarehouse, SnowflakeSession } from './snowflake.js';
export { loadPrivateKey } from './private-key.js';
export type { WarehouseSession, BindValue } from './types.js';
