#!/usr/bin/env node
/**
 * snowcache CLI
 */

import 'dotenv/config';
import { Command } from 'commander';
import { runQuery } from './cli/query.js';
import { runExec } from './cli/exec.js';
import { runExport } from './cli/export.js';
import { runDrop } from './cli/drop.js';
import { runCacheClear, runCacheList } from './cli/cache.js';
import { collectVariable } from './cli/options.js';

const program = new Command();

program
  .name('snowcache')
  .description('Cached Snowflake queries and table export')
  .version('0.1.0');

program
  .command('query <source>')
  .description('Run a .sql file or inline SELECT/WITH query, using the local cache')
  .option('-v, --var <name=value>', 'Query variable (repeatable)', collectVariable)
  .option('--no-cache', 'Ignore any cached result and refresh it')
  .option('-f, --format <type>', 'Output format (json|table)', 'table')
  .action(runQuery);

program
  .command('exec <file>')
  .description('Execute every statement of a SQL file')
  .option('-v, --var <name=value>', 'Query variable (repeatable)', collectVariable)
  .action(runExec);

program
  .command('export <table>')
  .description('Write rows from a JSON file to a table, creating it if needed')
  .requiredOption('-d, --database <database>', 'Target database')
  .requiredOption('-s, --schema <schema>', 'Target schema')
  .requiredOption('-i, --input <file>', 'JSON file holding an array of row objects')
  .option('--replace', 'Drop the table before writing')
  .action(runExport);

program
  .command('drop <database> <schema> <table>')
  .description('Drop a table if it exists')
  .action(runDrop);

const cache = program.command('cache').description('Manage locally cached results');

cache
  .command('list')
  .description('List cached result files')
  .action(runCacheList);

cache
  .command('clear [source]')
  .description('Delete the cached result for a query, or all cached results')
  .action(runCacheClear);

await program.parseAsync(process.argv);
