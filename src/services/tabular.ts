/**
 * Helpers for building and reshaping tabular results.
 */

import type { CellValue, Row, TabularResult } from '../types/models.js';
import { inferColumnType } from './schema-inference.js';

/**
 * Columns whose name starts with this marker carry warehouse metadata and are
 * never handed to callers.
 */
export const METADATA_COLUMN_PREFIX = '_';

/**
 * Coerce a raw driver or file value into a CellValue.
 */
export function normalizeCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (value instanceof Date) return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString('hex');
  return JSON.stringify(value);
}

/**
 * Build a result from plain row objects, inferring one type per column.
 * Column order follows first appearance across the rows.
 */
export function toTabularResult(rows: Row[]): TabularResult {
  const names: string[] = [];
  const known = new Set<string>();
  for (const row of rows) {
    for (const name of Object.keys(row)) {
      if (!known.has(name)) {
        known.add(name);
        names.push(name);
      }
    }
  }

  return {
    columns: names.map((name) => ({
      name,
      type: inferColumnType(rows.map((row) => row[name] ?? null)),
    })),
    rows,
  };
}

/**
 * Rename every column, keeping order, types and values.
 */
export function renameColumns(
  result: TabularResult,
  rename: (name: string) => string
): TabularResult {
  const columns = result.columns.map((column) => ({ ...column, name: rename(column.name) }));

  const rows = result.rows.map((row) => {
    const renamed: Row = {};
    result.columns.forEach((column, index) => {
      renamed[columns[index].name] = row[column.name] ?? null;
    });
    return renamed;
  });

  return { columns, rows };
}

/**
 * Drop metadata columns and lowercase the remaining names.
 */
export function cleanWarehouseResult(result: TabularResult): TabularResult {
  const kept = result.columns.filter(
    (column) => !column.name.startsWith(METADATA_COLUMN_PREFIX)
  );
  return renameColumns({ columns: kept, rows: result.rows }, (name) => name.toLowerCase());
}

/**
 * Uppercase every column name (unquoted warehouse identifiers).
 */
export function uppercaseColumns(result: TabularResult): TabularResult {
  return renameColumns(result, (name) => name.toUpperCase());
}
