/**
 * Option parsers shared by CLI commands.
 */

import { InvalidArgumentError } from 'commander';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Row, Variables } from '../types/models.js';

/**
 * Collect repeated `--var name=value` options into a variable map.
 */
export function collectVariable(assignment: string, previous: Variables = {}): Variables {
  const index = assignment.indexOf('=');
  if (index <= 0) {
    throw new InvalidArgumentError(`Expected name=value, got "${assignment}"`);
  }

  const name = assignment.slice(0, index).trim().replace(/^\$/, '');
  if (!/^\w+$/.test(name)) {
    throw new InvalidArgumentError(`Invalid variable name "${name}"`);
  }

  return { ...previous, [name]: assignment.slice(index + 1) };
}

const RowsSchema = z.array(
  z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
);

/**
 * Read export rows from a JSON file holding an array of flat objects.
 */
export async function readRowsFile(path: string): Promise<Row[]> {
  const parsed = RowsSchema.safeParse(JSON.parse(await readFile(path, 'utf8')));
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `${path} must contain an array of objects with string, number, boolean or null values`
    );
  }
  return parsed.data;
}
