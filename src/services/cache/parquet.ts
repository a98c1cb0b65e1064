/**
 * Parquet result cache.
 * One file per cache key under a fixed directory. Entries never expire.
 */

import { existsSync } from 'fs';
import { mkdir, readdir, rename, rm } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import type { CellValue, Column, ColumnType, Row, TabularResult } from '../../types/models.js';
import { CacheError } from '../../types/errors.js';
import { normalizeCell } from '../tabular.js';
import type { ResultCache } from './types.js';

export const CACHE_FILE_EXTENSION = '.parquet';

/**
 * Suffix of an artifact still being written. Renamed into place once complete.
 */
export const PARTIAL_FILE_SUFFIX = '.tmp';

/**
 * Key/value metadata entry holding the logical column list.
 */
const COLUMNS_METADATA_KEY = 'snowcache.columns';

const PARQUET_TYPES = {
  integer: 'INT64',
  float: 'DOUBLE',
  datetime: 'TIMESTAMP_MILLIS',
  boolean: 'BOOLEAN',
  string: 'UTF8',
} as const;

type ParquetType = (typeof PARQUET_TYPES)[ColumnType];

const ColumnsSchema = z.array(
  z.object({
    name: z.string(),
    type: z.enum(['integer', 'float', 'datetime', 'boolean', 'string']),
  })
);

/**
 * Whether every non-null value can be stored under the declared type.
 */
function conforms(type: ColumnType, values: CellValue[]): boolean {
  return values.every((value) => {
    if (value === null) return true;
    switch (type) {
      case 'integer':
        return typeof value === 'number' && Number.isInteger(value);
      case 'float':
        return typeof value === 'number';
      case 'datetime':
        return value instanceof Date;
      case 'boolean':
        return typeof value === 'boolean';
      default:
        return true;
    }
  });
}

/**
 * Physical Parquet type for a conforming column. INT64 drops the sign of -0,
 * so integer columns holding it are stored as DOUBLE.
 */
function storageType(type: ColumnType, values: CellValue[]): ParquetType {
  if (type === 'integer' && values.some((value) => Object.is(value, -0))) {
    return PARQUET_TYPES.float;
  }
  return PARQUET_TYPES[type];
}

function toText(value: Exclude<CellValue, null>): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class ParquetCache implements ResultCache {
  constructor(private dir: string) {}

  path(cacheKey: string): string {
    return join(this.dir, `${cacheKey}${CACHE_FILE_EXTENSION}`);
  }

  async get(cacheKey: string): Promise<TabularResult | undefined> {
    const file = this.path(cacheKey);
    if (!existsSync(file)) {
      return undefined;
    }

    let reader: ParquetReader;
    try {
      reader = await ParquetReader.openFile(file);
    } catch (error) {
      throw new CacheError(`Failed to open cache file ${file}: ${error}`);
    }

    try {
      const parsed = ColumnsSchema.safeParse(
        JSON.parse(String(reader.getMetadata()[COLUMNS_METADATA_KEY] ?? '[]'))
      );
      if (!parsed.success) {
        throw new CacheError(`Cache file ${file} has no valid column metadata`);
      }
      const columns: Column[] = parsed.data;

      const rows: Row[] = [];
      const cursor = reader.getCursor();
      for (let record: unknown = await cursor.next(); isRecord(record); record = await cursor.next()) {
        const row: Row = {};
        for (const column of columns) {
          row[column.name] = normalizeCell(record[column.name]);
        }
        rows.push(row);
      }

      return { columns, rows };
    } catch (error) {
      if (error instanceof CacheError) throw error;
      throw new CacheError(`Failed to read cache file ${file}: ${error}`);
    } finally {
      await reader.close();
    }
  }

  async set(cacheKey: string, result: TabularResult): Promise<void> {
    const file = this.path(cacheKey);

    // Parquet cannot hold a schema without fields.
    if (result.columns.length === 0) {
      await this.delete(cacheKey);
      return;
    }

    await mkdir(this.dir, { recursive: true });

    // A column whose values do not fit its declared type is stored as text.
    const columns = result.columns.map((column): Column => {
      const values = result.rows.map((row) => row[column.name] ?? null);
      return conforms(column.type, values) ? column : { name: column.name, type: 'string' };
    });

    const fields: Record<string, { type: ParquetType; optional: boolean }> = {};
    for (const column of columns) {
      const values = result.rows.map((row) => row[column.name] ?? null);
      fields[column.name] = { type: storageType(column.type, values), optional: true };
    }

    const partial = `${file}${PARTIAL_FILE_SUFFIX}`;
    try {
      const writer = await ParquetWriter.openFile(new ParquetSchema(fields), partial);
      writer.setMetadata(COLUMNS_METADATA_KEY, JSON.stringify(columns));

      try {
        for (const row of result.rows) {
          const record: Record<string, CellValue> = {};
          for (const column of columns) {
            const value = row[column.name] ?? null;
            if (value !== null) {
              record[column.name] = column.type === 'string' ? toText(value) : value;
            }
          }
          await writer.appendRow(record);
        }
      } finally {
        await writer.close();
      }

      await rename(partial, file);
    } catch (error) {
      await rm(partial, { force: true });
      throw new CacheError(`Failed to write cache file ${file}: ${error}`);
    }
  }

  async delete(cacheKey: string): Promise<boolean> {
    const file = this.path(cacheKey);
    if (!existsSync(file)) {
      return false;
    }
    await rm(file);
    return true;
  }

  async clear(): Promise<number> {
    const keys = await this.keys();
    for (const key of keys) {
      await rm(this.path(key));
    }
    return keys.length;
  }

  async keys(): Promise<string[]> {
    if (!existsSync(this.dir)) {
      return [];
    }
    const entries = await readdir(this.dir);
    return entries
      .filter((entry) => entry.endsWith(CACHE_FILE_EXTENSION))
      .map((entry) => entry.slice(0, -CACHE_FILE_EXTENSION.length))
      .sort();
  }
}
