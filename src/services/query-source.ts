/**
 * Query source resolution.
 *
 * Turns the string a caller passes to fetchData() into canonical query text
 * and the key its result is cached under.
 */

import { createHash } from 'crypto';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join, parse } from 'path';
import type { QuerySource } from '../types/models.js';
import { QueryValidationError, SqlFileNotFoundError } from '../types/errors.js';

export const SQL_FILE_EXTENSION = '.sql';

const READ_ONLY_PREFIX = /^(select|with)/i;

export interface ResolveOptions {
  /**
   * Directory relative file references live under.
   * @default "sql"
   */
  sqlRoot?: string;
}

/**
 * Whether the input names a SQL file rather than carrying SQL text.
 */
export function isSqlFileReference(input: string): boolean {
  return input.toLowerCase().endsWith(SQL_FILE_EXTENSION);
}

/**
 * Place a file reference under the SQL root unless it already is.
 */
export function normalizeSqlPath(input: string, sqlRoot: string = 'sql'): string {
  const prefix = sqlRoot.endsWith('/') ? sqlRoot : `${sqlRoot}/`;
  return input.startsWith(prefix) ? input : join(sqlRoot, input);
}

/**
 * Cache key for inline text: MD5 of the trimmed query.
 *
 * Computed before variable substitution, so the same skeleton with different
 * variables maps to the same key.
 */
export function hashQuery(text: string): string {
  return createHash('md5').update(text.trim(), 'utf8').digest('hex');
}

/**
 * Resolve a query source.
 *
 * @throws {SqlFileNotFoundError} when a referenced file does not exist
 * @throws {QueryValidationError} when inline text is not a SELECT/WITH query
 */
export async function resolveQuery(
  input: string,
  options: ResolveOptions = {}
): Promise<QuerySource> {
  if (isSqlFileReference(input)) {
    const path = normalizeSqlPath(input, options.sqlRoot);
    if (!existsSync(path)) {
      throw new SqlFileNotFoundError(path);
    }

    return {
      kind: 'file',
      path,
      text: await readFile(path, 'utf8'),
      cacheKey: parse(path).name,
    };
  }

  const text = input.trim();
  if (!READ_ONLY_PREFIX.test(text)) {
    throw new QueryValidationError(
      "The input must be a filename ending with '.sql' or a SQL query starting with 'select' or 'with'"
    );
  }

  return {
    kind: 'inline',
    text,
    cacheKey: hashQuery(text),
  };
}
