/**
 * In-process stand-in for a warehouse session.
 *
 * Understands just enough SQL to back the client's export, drop and
 * `select * from schema.table` paths; everything else is answered from
 * canned responses, or a one-row STATUS result.
 */

import type { BulkWriteResult, TabularResult } from '../types/models.js';
import type { BindValue, WarehouseSession } from '../services/warehouse/types.js';
import { TABLE_EXISTS_SQL } from '../QueryCacheClient.js';

const EMPTY: TabularResult = { columns: [], rows: [] };

/**
 * Answer for queries with no canned response.
 */
const DEFAULT_RESULT: TabularResult = {
  columns: [{ name: 'STATUS', type: 'string' }],
  rows: [{ STATUS: 'ok' }],
};

export interface RecordedStatement {
  sql: string;
  binds: BindValue[];
}

export class FakeWarehouseSession implements WarehouseSession {
  statements: RecordedStatement[] = [];
  bulkWrites: Array<{ table: string; data: TabularResult }> = [];
  tables = new Map<string, TabularResult>();
  closed = false;

  /**
   * Forces the next bulk writes to report this result.
   */
  bulkWriteResult?: BulkWriteResult;

  private responses = new Map<string, TabularResult>();
  private failures = new Map<string, Error>();
  private currentSchema = '';

  respond(sql: string, result: TabularResult): void {
    this.responses.set(sql, result);
  }

  fail(sql: string, error: Error): void {
    this.failures.set(sql, error);
  }

  executed(sql: string): number {
    return this.statements.filter((statement) => statement.sql === sql).length;
  }

  async execute(sqlText: string, binds: BindValue[] = []): Promise<TabularResult> {
    this.statements.push({ sql: sqlText, binds });

    const failure = this.failures.get(sqlText);
    if (failure) {
      throw failure;
    }

    const useSchema = /^USE SCHEMA (\w+)$/.exec(sqlText);
    if (useSchema) {
      this.currentSchema = useSchema[1];
      return EMPTY;
    }
    if (/^USE DATABASE \w+$/.test(sqlText)) {
      return EMPTY;
    }

    if (sqlText === TABLE_EXISTS_SQL) {
      const exists = this.tables.has(`${binds[0]}.${binds[1]}`);
      return {
        columns: [{ name: 'COUNT(*)', type: 'integer' }],
        rows: [{ 'COUNT(*)': exists ? 1 : 0 }],
      };
    }

    const create = /^CREATE TABLE (\w+)\.(\w+) \(/.exec(sqlText);
    if (create) {
      this.tables.set(`${create[1]}.${create[2].toUpperCase()}`, { columns: [], rows: [] });
      return EMPTY;
    }

    const drop = /^DROP TABLE (\w+)\.(\w+)$/.exec(sqlText);
    if (drop) {
      this.tables.delete(`${drop[1]}.${drop[2].toUpperCase()}`);
      return EMPTY;
    }

    const selectAll = /^select \* from (\w+)\.(\w+)$/i.exec(sqlText);
    if (selectAll) {
      const stored = this.tables.get(`${selectAll[1]}.${selectAll[2].toUpperCase()}`);
      if (stored) {
        return { columns: [...stored.columns], rows: stored.rows.map((row) => ({ ...row })) };
      }
    }

    return this.responses.get(sqlText) ?? DEFAULT_RESULT;
  }

  async bulkWrite(table: string, data: TabularResult): Promise<BulkWriteResult> {
    this.bulkWrites.push({ table, data });
    if (this.bulkWriteResult) {
      return this.bulkWriteResult;
    }

    const key = `${this.currentSchema}.${table.toUpperCase()}`;
    const stored = this.tables.get(key) ?? { columns: [], rows: [] };
    this.tables.set(key, {
      columns: stored.columns.length > 0 ? stored.columns : data.columns,
      rows: [...stored.rows, ...data.rows],
    });
    return { success: true, rowCount: data.rows.length };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
