/**
 * Column type inference and DDL generation for table creation.
 */

import type { CellValue, Column, ColumnType } from '../types/models.js';

/**
 * Warehouse types used when creating a table.
 */
export const WAREHOUSE_TYPES: Record<ColumnType, string> = {
  integer: 'NUMBER',
  float: 'FLOAT',
  datetime: 'TIMESTAMP_NTZ',
  boolean: 'BOOLEAN',
  string: 'STRING',
};

/**
 * Type of a single non-null value.
 */
export function inferValueType(value: Exclude<CellValue, null>): ColumnType {
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  if (value instanceof Date) return 'datetime';
  return 'string';
}

/**
 * Type of a column from its values. Nulls are ignored; integers mixed with
 * floats widen to float; any other mix, and an all-null column, is a string.
 */
export function inferColumnType(values: Iterable<CellValue>): ColumnType {
  const seen = new Set<ColumnType>();
  for (const value of values) {
    if (value !== null) {
      seen.add(inferValueType(value));
    }
  }

  if (seen.size === 1) {
    const [only] = seen;
    return only;
  }
  if (seen.size === 2 && seen.has('integer') && seen.has('float')) {
    return 'float';
  }
  return 'string';
}

/**
 * Map a column type to the warehouse type used in CREATE TABLE.
 *
 * Unsupported types load as STRING rather than failing the export.
 */
export function toWarehouseType(type: ColumnType): string {
  switch (type) {
    case 'integer':
      return WAREHOUSE_TYPES.integer;
    case 'float':
      return WAREHOUSE_TYPES.float;
    case 'datetime':
      return WAREHOUSE_TYPES.datetime;
    case 'boolean':
      return WAREHOUSE_TYPES.boolean;
    default:
      return WAREHOUSE_TYPES.string;
  }
}

/**
 * Build a CREATE TABLE statement for the given columns.
 */
export function buildCreateTable(schema: string, table: string, columns: Column[]): string {
  const columnDefs = columns
    .map((column) => `${column.name} ${toWarehouseType(column.type)}`)
    .join(', ');
  return `CREATE TABLE ${schema}.${table} (${columnDefs})`;
}
