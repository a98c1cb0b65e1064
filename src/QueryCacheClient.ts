/**
 * Main snowcache class - cached query execution and table export on top of a
 * warehouse session.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import type { Logger } from 'pino';
import { loadConfig } from './config.js';
import type { ConfigOverrides } from './config.js';
import type {
  CellValue,
  ExportOptions,
  ExportResult,
  TabularResult,
  Variables,
} from './types/models.js';
import { SqlFileNotFoundError } from './types/errors.js';
import { createLogger, silentLogger } from './utils/logger.js';
import { ParquetCache } from './services/cache/index.js';
import type { ResultCache } from './services/cache/index.js';
import { resolveQuery } from './services/query-source.js';
import { splitStatements, substituteVariables } from './services/variables.js';
import { buildCreateTable } from './services/schema-inference.js';
import { cleanWarehouseResult, toTabularResult, uppercaseColumns } from './services/tabular.js';
import { connectWarehouse } from './services/warehouse/index.js';
import type { WarehouseSession } from './services/warehouse/index.js';

/**
 * Catalog lookup used to decide whether a table exists.
 */
export const TABLE_EXISTS_SQL =
  'SELECT COUNT(*) FROM information_schema.tables WHERE table_schema = ? AND table_name = ?';

export interface QueryCacheClientOptions {
  /**
   * Directory relative `.sql` references are resolved under.
   * @default "sql"
   */
  sqlRoot?: string;

  /**
   * Directory for Parquet cache artifacts. Ignored when `cache` is given.
   * @default "sql/caches"
   */
  cacheDir?: string;

  /**
   * Custom result cache.
   */
  cache?: ResultCache;

  /**
   * Logger. Defaults to a silent one.
   */
  logger?: Logger;
}

/**
 * snowcache client
 *
 * @example
 * ```typescript
 * const client = await QueryCacheClient.connect({ database: 'ANALYTICS' });
 *
 * const orders = await client.fetchData('daily_orders.sql', { day: "'2024-05-01'" });
 * await client.exportData({
 *   table: 'order_summary',
 *   database: 'ANALYTICS',
 *   schema: 'REPORTING',
 *   rows: orders,
 * });
 *
 * await client.close();
 * ```
 */
export class QueryCacheClient {
  private cache: ResultCache;
  private sqlRoot: string;
  private logger: Logger;

  constructor(
    private session: WarehouseSession,
    options: QueryCacheClientOptions = {}
  ) {
    this.sqlRoot = options.sqlRoot ?? 'sql';
    this.cache = options.cache ?? new ParquetCache(options.cacheDir ?? 'sql/caches');
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Resolve configuration, open a Snowflake session and wrap it in a client.
   *
   * Explicit overrides take precedence over SNOWFLAKE_* environment variables.
   */
  static async connect(
    overrides: ConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env
  ): Promise<QueryCacheClient> {
    const config = loadConfig(overrides, env);
    const logger = createLogger(config.logLevel);
    const session = await connectWarehouse(config, logger);

    return new QueryCacheClient(session, {
      sqlRoot: config.sqlRoot,
      cacheDir: config.cacheDir,
      logger,
    });
  }

  /**
   * Fetch a query result, from the local cache when possible.
   *
   * `querySource` is either a `.sql` file (resolved under the SQL root) or
   * inline text starting with SELECT or WITH. The cache key is derived from the
   * text before variables are substituted, so two calls that only differ in
   * `variables` share one cache entry.
   *
   * @example
   * ```typescript
   * const result = await client.fetchData('select * from t where id = $id', { id: 42 });
   * console.log(result.columns); // lowercased, metadata columns removed
   * ```
   */
  async fetchData(
    querySource: string,
    variables: Variables = {},
    useCache: boolean = true
  ): Promise<TabularResult> {
    const source = await resolveQuery(querySource, { sqlRoot: this.sqlRoot });

    if (useCache) {
      const cached = await this.cache.get(source.cacheKey);
      if (cached) {
        this.logger.info({ cacheKey: source.cacheKey }, 'Using cached result');
        return cached;
      }
    }

    const sql = substituteVariables(source.text, variables);
    this.logger.info({ cacheKey: source.cacheKey }, 'Fetching data from Snowflake');
    this.logger.debug({ sql }, 'Executing query');

    const result = cleanWarehouseResult(await this.session.execute(sql));
    await this.cache.set(source.cacheKey, result);

    this.logger.info(
      { cacheKey: source.cacheKey, rows: result.rows.length, path: this.cache.path(source.cacheKey) },
      'Query result cached'
    );
    return result;
  }

  /**
   * Write rows to a warehouse table, creating it when it does not exist.
   *
   * Column names are uppercased. When the table is created, column types are
   * inferred from the data. A failed load is reported in the result rather
   * than thrown.
   */
  async exportData(options: ExportOptions): Promise<ExportResult> {
    const { table, database, schema, append = true } = options;

    if (!append) {
      await this.dropTable(database, schema, table);
    }

    const data = Array.isArray(options.rows) ? toTabularResult(options.rows) : options.rows;
    if (data.rows.length === 0) {
      this.logger.warn({ table }, 'No rows to export');
      return { success: true, rowCount: 0, created: false };
    }

    const upper = uppercaseColumns(data);
    await this.useContext(database, schema);

    let created = false;
    if (!(await this.tableExists(schema, table))) {
      const ddl = buildCreateTable(schema, table, upper.columns);
      this.logger.debug({ sql: ddl }, 'Generated SQL for table creation');
      await this.session.execute(ddl);
      created = true;
      this.logger.info({ table }, 'Table created');
    } else {
      this.logger.info({ table }, 'Table already exists');
    }

    this.logger.info({ table, rows: upper.rows.length }, 'Writing rows to Snowflake');
    const result = await this.session.bulkWrite(table, upper);

    if (result.success) {
      this.logger.info({ table, rows: result.rowCount }, 'Rows written to Snowflake');
    } else {
      this.logger.error({ table, error: result.error }, 'Failed to write rows to Snowflake');
    }

    return { ...result, created };
  }

  /**
   * Drop a table if it exists. Returns whether a table was dropped.
   */
  async dropTable(database: string, schema: string, table: string): Promise<boolean> {
    await this.useContext(database, schema);

    if (!(await this.tableExists(schema, table))) {
      this.logger.info({ table }, 'Table does not exist');
      return false;
    }

    await this.session.execute(`DROP TABLE ${schema}.${table}`);
    this.logger.info({ table }, 'Table dropped');
    return true;
  }

  /**
   * Run every statement of a SQL file in order, after variable substitution.
   *
   * Statements are split on `;` without regard to string literals, and run
   * without a transaction: a failure leaves earlier statements applied.
   * Returns the number of statements executed.
   */
  async executeSql(filePath: string, variables: Variables = {}): Promise<number> {
    if (!existsSync(filePath)) {
      throw new SqlFileNotFoundError(filePath);
    }

    const text = await readFile(filePath, 'utf8');
    const statements = splitStatements(substituteVariables(text, variables));

    for (const statement of statements) {
      this.logger.debug({ sql: statement }, 'Executing SQL command');
      await this.session.execute(statement);
    }

    this.logger.info({ file: filePath, statements: statements.length }, 'SQL file executed');
    return statements.length;
  }

  /**
   * Delete the cache entry for one query source, or every entry.
   * Returns the number of artifacts removed.
   */
  async clearCache(querySource?: string): Promise<number> {
    if (querySource === undefined) {
      return this.cache.clear();
    }

    const source = await resolveQuery(querySource, { sqlRoot: this.sqlRoot });
    return (await this.cache.delete(source.cacheKey)) ? 1 : 0;
  }

  /**
   * List cached keys.
   */
  async listCache(): Promise<string[]> {
    return this.cache.keys();
  }

  /**
   * Close the warehouse session.
   */
  async close(): Promise<void> {
    await this.session.close();
  }

  private async useContext(database: string, schema: string): Promise<void> {
    await this.session.execute(`USE DATABASE ${database}`);
    await this.session.execute(`USE SCHEMA ${schema}`);
  }

  private async tableExists(schema: string, table: string): Promise<boolean> {
    const result = await this.session.execute(TABLE_EXISTS_SQL, [schema, table.toUpperCase()]);
    return Number(firstCell(result) ?? 0) > 0;
  }
}

function firstCell(result: TabularResult): CellValue | undefined {
  const [row] = result.rows;
  const [column] = result.columns;
  if (!row || !column) {
    return undefined;
  }
  return row[column.name];
}
