/**
 * Core data types shared by the client, the cache and the warehouse session.
 */

// ============================================================================
// TABULAR RESULTS
// ============================================================================

/**
 * Logical column types. Anything the warehouse reports that does not fit one
 * of the first four collapses to 'string'.
 */
export type ColumnType = 'integer' | 'float' | 'datetime' | 'boolean' | 'string';

/**
 * A single cell value as handed to callers.
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * A result row keyed by column name.
 */
export type Row = Record<string, CellValue>;

/**
 * Named, typed column.
 */
export interface Column {
	readonly name: string;
	readonly type: ColumnType;
}

/**
 * Ordered columns plus the rows that populate them.
 */
export interface TabularResult {
	columns: Column[];
	rows: Row[];
}

// ============================================================================
// QUERY SOURCES
// ============================================================================

/**
 * Values that may be substituted into `$name` placeholders.
 */
export type VariableValue = string | number | boolean | bigint;

/**
 * Variable map keyed by name, without the `$` prefix.
 */
export type Variables = Record<string, VariableValue>;

/**
 * Query read from a `.sql` file under the SQL root.
 */
export interface FileQuerySource {
	readonly kind: 'file';
	readonly path: string;
	readonly text: string;
	readonly cacheKey: string;
}

/**
 * Query passed inline as SQL text.
 */
export interface InlineQuerySource {
	readonly kind: 'inline';
	readonly text: string;
	readonly cacheKey: string;
}

/**
 * Resolved query: canonical text plus the key its result is cached under.
 */
export type QuerySource = FileQuerySource | InlineQuerySource;

// ============================================================================
// EXPORT
// ============================================================================

/**
 * Outcome of a bulk load, as reported by the session.
 */
export interface BulkWriteResult {
	success: boolean;
	rowCount: number;
	error?: string;
}

/**
 * Outcome of exportData().
 */
export interface ExportResult extends BulkWriteResult {
	/**
	 * Whether the target table was created by this export.
	 */
	created: boolean;
}

export interface ExportOptions {
	table: string;
	database: string;
	schema: string;

	/**
	 * Plain row objects (types inferred from values) or a result whose column
	 * types are reused as-is.
	 */
	rows: Row[] | TabularResult;

	/**
	 * Append to an existing table. When false the table is dropped first.
	 * @default true
	 */
	append?: boolean;
}
