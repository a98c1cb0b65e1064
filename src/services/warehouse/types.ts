/**
 * Warehouse session contract.
 * The client only talks to the warehouse through this interface.
 */

import type { BulkWriteResult, TabularResult } from '../../types/models.js';

/**
 * Positional bind values for `?` placeholders.
 */
export type BindValue = string | number;

export interface WarehouseSession {
  /**
   * Run one statement and return its full result.
   * Driver errors are rejected as-is.
   */
  execute(sqlText: string, binds?: BindValue[]): Promise<TabularResult>;

  /**
   * Load every row of `data` into an existing table.
   * Failures are reported in the result, not thrown.
   */
  bulkWrite(table: string, data: TabularResult): Promise<BulkWriteResult>;

  /**
   * Release the underlying connection.
   */
  close(): Promise<void>;
}
