/**
 * `$name` variable substitution for query text and SQL files.
 */

import type { Variables } from '../types/models.js';
import { MissingVariableError } from '../types/errors.js';

const VARIABLE_TOKEN = /\$(\w+)/g;
const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Rewrite every `$identifier` token as a `{identifier}` placeholder.
 */
export function toPlaceholders(text: string): string {
  return text.replace(VARIABLE_TOKEN, '{$1}');
}

/**
 * Fill `{identifier}` placeholders from the variable map.
 *
 * @throws {MissingVariableError} when a placeholder has no value
 */
export function fillPlaceholders(text: string, variables: Variables): string {
  return text.replace(PLACEHOLDER, (_match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(variables, name)) {
      throw new MissingVariableError(name);
    }
    return String(variables[name]);
  });
}

/**
 * Substitute `$identifier` tokens with caller-supplied values.
 *
 * Values are inserted verbatim; quoting string literals is up to the query.
 *
 * @example
 * ```typescript
 * substituteVariables('select * from t where id = $id', { id: '42' });
 * // => 'select * from t where id = 42'
 * ```
 */
export function substituteVariables(text: string, variables: Variables = {}): string {
  return fillPlaceholders(toPlaceholders(text), variables);
}

/**
 * Split SQL text into statements on `;`.
 *
 * Does not understand string literals or comments: a `;` inside a literal
 * splits the statement.
 */
export function splitStatements(sql: string): string[] {
  return sql
    .trim()
    .split(';')
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}
