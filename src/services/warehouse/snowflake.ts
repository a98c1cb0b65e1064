/**
 * Snowflake session backed by snowflake-sdk.
 */

import { existsSync } from 'fs';
import snowflake from 'snowflake-sdk';
import type { Connection, ConnectionOptions } from 'snowflake-sdk';
import type { Logger } from 'pino';
import type { WarehouseConfig } from '../../config.js';
import type {
  BulkWriteResult,
  CellValue,
  Column,
  ColumnType,
  Row,
  TabularResult,
} from '../../types/models.js';
import { ConfigurationError } from '../../types/errors.js';
import { normalizeCell } from '../tabular.js';
import { loadPrivateKey } from './private-key.js';
import type { BindValue, WarehouseSession } from './types.js';

/**
 * Map a driver column type to a logical column type.
 */
export function columnTypeFor(driverType: string, scale: number = 0): ColumnType {
  switch (driverType.toLowerCase()) {
    case 'fixed':
    case 'number':
      return scale === 0 ? 'integer' : 'float';
    case 'real':
    case 'float':
      return 'float';
    case 'boolean':
      return 'boolean';
    case 'date':
    case 'timestamp_ltz':
    case 'timestamp_ntz':
    case 'timestamp_tz':
      return 'datetime';
    default:
      return 'string';
  }
}

/**
 * Bind form of a non-null cell. Dates bind as TIMESTAMP_NTZ text; booleans
 * and non-finite floats bind as text the warehouse casts on insert.
 */
export function toBindValue(value: Exclude<CellValue, null>): BindValue {
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN';
    if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString().replace('T', ' ').replace('Z', '');
  }
  return value;
}

export interface InsertStatement {
  sql: string;
  binds: BindValue[][];
  rowCount: number;
}

/**
 * Array-bind INSERT statements for `rows`.
 *
 * Bind values cannot be null, so rows are grouped by their non-null columns
 * and each group inserts only those; the columns left out load as NULL.
 * Rows with no values at all are inserted through a generator.
 */
export function buildInserts(table: string, columns: Column[], rows: Row[]): InsertStatement[] {
  const groups = new Map<string, { names: string[]; binds: BindValue[][] }>();
  let allNull = 0;

  for (const row of rows) {
    const names: string[] = [];
    const binds: BindValue[] = [];
    for (const column of columns) {
      const value = row[column.name] ?? null;
      if (value !== null) {
        names.push(column.name);
        binds.push(toBindValue(value));
      }
    }

    if (names.length === 0) {
      allNull++;
      continue;
    }

    const key = names.join(', ');
    const group = groups.get(key) ?? { names, binds: [] };
    group.binds.push(binds);
    groups.set(key, group);
  }

  const statements: InsertStatement[] = [...groups.values()].map((group) => ({
    sql: `INSERT INTO ${table} (${group.names.join(', ')}) VALUES (${group.names.map(() => '?').join(', ')})`,
    binds: group.binds,
    rowCount: group.binds.length,
  }));

  if (allNull > 0 && columns.length > 0) {
    statements.push({
      sql: `INSERT INTO ${table} (${columns[0].name}) SELECT NULL FROM TABLE(GENERATOR(ROWCOUNT => ${allNull}))`,
      binds: [],
      rowCount: allNull,
    });
  }

  return statements;
}

/**
 * Driver connection options for the configured authentication method.
 *
 * Key-pair authentication is used when a private key path is configured and
 * the file exists; otherwise the driver opens a browser for SSO.
 */
export async function buildConnectionOptions(
  config: WarehouseConfig,
  logger: Logger
): Promise<ConnectionOptions> {
  if (!config.account) {
    throw new ConfigurationError('SNOWFLAKE_ACCOUNT is required to connect');
  }

  const base: ConnectionOptions = {
    account: config.account,
    username: config.user,
    role: config.role,
    warehouse: config.warehouse,
    database: config.database,
    schema: config.schema,
  };

  if (config.privateKeyPath && existsSync(config.privateKeyPath)) {
    logger.info('Using private key to log in to Snowflake');
    return {
      ...base,
      authenticator: 'SNOWFLAKE_JWT',
      privateKey: await loadPrivateKey(config.privateKeyPath, config.privateKeyPassphrase),
    };
  }

  logger.warn('No private key found, using browser authentication. Please log in to Snowflake.');
  return {
    ...base,
    authenticator: 'EXTERNALBROWSER',
  };
}

/**
 * Open an authenticated Snowflake session.
 * Connection and authentication errors are rejected unmodified.
 */
export async function connectWarehouse(
  config: WarehouseConfig,
  logger: Logger
): Promise<SnowflakeSession> {
  const connection = snowflake.createConnection(await buildConnectionOptions(config, logger));

  await new Promise<void>((resolve, reject) => {
    connection
      .connectAsync((err) => (err ? reject(err) : resolve()))
      .catch(reject);
  });

  logger.info({ account: config.account, database: config.database }, 'Connected to Snowflake');
  return new SnowflakeSession(connection, logger);
}

export class SnowflakeSession implements WarehouseSession {
  constructor(
    private connection: Connection,
    private logger: Logger
  ) {}

  execute(sqlText: string, binds: BindValue[] = []): Promise<TabularResult> {
    return this.run(sqlText, binds);
  }

  /**
   * Load rows with array binds. Past the driver's array-bind threshold the
   * rows are uploaded to a temporary stage instead of inlined.
   */
  async bulkWrite(table: string, data: TabularResult): Promise<BulkWriteResult> {
    let rowCount = 0;

    for (const insert of buildInserts(table, data.columns, data.rows)) {
      try {
        await this.run(insert.sql, insert.binds);
      } catch (error) {
        this.logger.error({ err: error, table, rowCount }, 'Bulk write failed');
        return { success: false, rowCount, error: String(error) };
      }
      rowCount += insert.rowCount;
    }

    return { success: true, rowCount };
  }

  private run(sqlText: string, binds: BindValue[] | BindValue[][]): Promise<TabularResult> {
    return new Promise((resolve, reject) => {
      this.connection.execute({
        sqlText,
        binds,
        complete: (err, stmt, rows) => {
          if (err) {
            reject(err);
            return;
          }

          const columns: Column[] = (stmt.getColumns() ?? []).map((column) => ({
            name: column.getName(),
            type: columnTypeFor(column.getType(), column.getScale()),
          }));

          resolve({
            columns,
            rows: (rows ?? []).map((raw: Record<string, unknown>) => {
              const row: Row = {};
              for (const column of columns) {
                row[column.name] = normalizeCell(raw[column.name]);
              }
              return row;
            }),
          });
        },
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.connection.destroy((err) => (err ? reject(err) : resolve()));
    });
  }
}
