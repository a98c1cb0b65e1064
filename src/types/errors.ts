/**
 * Custom error classes for snowcache.
 *
 * Errors raised by the warehouse driver itself are never wrapped: callers see
 * the driver's own error. These classes cover input validation, configuration
 * and the local cache.
 */

function formatMessage(message: string, suggestions: string[]): string {
  return `${message}\n\nSuggested fixes:\n${suggestions.map((s) => `  • ${s}`).join('\n')}`;
}

/**
 * Error thrown when the configuration cannot be validated.
 *
 * Common causes:
 * - A numeric or enum environment variable holds an unexpected value
 * - LOG_LEVEL is not one of the pino levels
 */
export class ConfigurationError extends Error {
  public readonly issues: string[];
  public readonly suggestions: string[];

  constructor(message: string, issues: string[] = []) {
    const suggestions = [
      'Check the SNOWFLAKE_* variables in your environment or .env file',
      'Pass explicit values to QueryCacheClient.connect() to override the environment',
    ];
    const details = issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message;
    super(formatMessage(details, suggestions));
    this.name = 'ConfigurationError';
    this.issues = issues;
    this.suggestions = suggestions;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when inline query text is not a read-only statement.
 *
 * Inline text goes through the caching path, so only statements starting with
 * SELECT or WITH are accepted there. Mutating SQL belongs in a file run with
 * executeSql().
 */
export class QueryValidationError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions || [
      "Pass a filename ending with '.sql'",
      "Start inline queries with 'select' or 'with'",
      'Use executeSql() for statements that modify data',
    ];
    super(formatMessage(message, suggestionList));
    this.name = 'QueryValidationError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, QueryValidationError.prototype);
  }
}

/**
 * Error thrown when a referenced SQL file does not exist.
 */
export class SqlFileNotFoundError extends Error {
  public readonly path: string;
  public readonly suggestions: string[];

  constructor(path: string) {
    const suggestions = [
      'Relative paths are resolved under the SQL root (sql/ by default)',
      'Check the spelling and extension of the file name',
    ];
    super(formatMessage(`File ${path} not found`, suggestions));
    this.name = 'SqlFileNotFoundError';
    this.path = path;
    this.suggestions = suggestions;
    Object.setPrototypeOf(this, SqlFileNotFoundError.prototype);
  }
}

/**
 * Error thrown when a query references a `$variable` that was not supplied.
 */
export class MissingVariableError extends Error {
  public readonly variable: string;
  public readonly suggestions: string[];

  constructor(variable: string) {
    const suggestions = [
      `Add "${variable}" to the variables map`,
      'Variable names are passed without the leading $',
    ];
    super(formatMessage(`Missing value for query variable $${variable}`, suggestions));
    this.name = 'MissingVariableError';
    this.variable = variable;
    this.suggestions = suggestions;
    Object.setPrototypeOf(this, MissingVariableError.prototype);
  }
}

/**
 * Error thrown when a cache artifact cannot be read or written.
 *
 * Common causes:
 * - The Parquet file was truncated by a concurrent writer
 * - The cache directory is not writable
 */
export class CacheError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions || [
      'Delete the cache file and run the query again',
      'Pass useCache: false (or --no-cache) to bypass the cache',
      'Check permissions on the cache directory',
    ];
    super(formatMessage(message, suggestionList));
    this.name = 'CacheError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, CacheError.prototype);
  }
}
