import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'crypto';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  hashQuery,
  isSqlFileReference,
  normalizeSqlPath,
  resolveQuery,
} from '../query-source.js';
import { QueryValidationError, SqlFileNotFoundError } from '../../types/errors.js';

describe('isSqlFileReference', () => {
  it('matches the .sql extension case-insensitively', () => {
    expect(isSqlFileReference('reports/daily.sql')).toBe(true);
    expect(isSqlFileReference('DAILY.SQL')).toBe(true);
    expect(isSqlFileReference('select 1')).toBe(false);
  });
});

describe('normalizeSqlPath', () => {
  it('prefixes the SQL root when missing', () => {
    expect(normalizeSqlPath('daily.sql')).toBe('sql/daily.sql');
    expect(normalizeSqlPath('reports/daily.sql')).toBe('sql/reports/daily.sql');
  });

  it('keeps paths already under the SQL root', () => {
    expect(normalizeSqlPath('sql/daily.sql')).toBe('sql/daily.sql');
  });

  it('honours a custom root', () => {
    expect(normalizeSqlPath('daily.sql', '/srv/queries')).toBe('/srv/queries/daily.sql');
    expect(normalizeSqlPath('/srv/queries/daily.sql', '/srv/queries')).toBe(
      '/srv/queries/daily.sql'
    );
  });
});

describe('hashQuery', () => {
  it('is the MD5 hex digest of the trimmed text', () => {
    expect(hashQuery('  select 1 \n')).toBe(createHash('md5').update('select 1').digest('hex'));
  });

  it('differs for different text', () => {
    expect(hashQuery('select 1')).not.toBe(hashQuery('select 2'));
  });
});

describe('resolveQuery', () => {
  let sqlRoot: string;

  beforeEach(() => {
    sqlRoot = mkdtempSync(join(tmpdir(), 'snowcache-sql-'));
  });

  afterEach(() => {
    rmSync(sqlRoot, { recursive: true, force: true });
  });

  it('reads a file and keys it by file stem', async () => {
    mkdirSync(join(sqlRoot, 'reports'));
    writeFileSync(join(sqlRoot, 'reports', 'weekly.sql'), 'select * from weekly\n');

    const source = await resolveQuery('reports/weekly.sql', { sqlRoot });

    expect(source).toEqual({
      kind: 'file',
      path: join(sqlRoot, 'reports', 'weekly.sql'),
      text: 'select * from weekly\n',
      cacheKey: 'weekly',
    });
  });

  it('raises SqlFileNotFoundError with the resolved path', async () => {
    await expect(resolveQuery('absent.sql', { sqlRoot })).rejects.toMatchObject({
      name: 'SqlFileNotFoundError',
      path: join(sqlRoot, 'absent.sql'),
    });
    await expect(resolveQuery('absent.sql', { sqlRoot })).rejects.toBeInstanceOf(
      SqlFileNotFoundError
    );
  });

  it('trims inline SELECT text and keys it by hash', async () => {
    const source = await resolveQuery('  SELECT * FROM t  ');

    expect(source).toEqual({
      kind: 'inline',
      text: 'SELECT * FROM t',
      cacheKey: hashQuery('SELECT * FROM t'),
    });
  });

  it('accepts inline WITH queries', async () => {
    const source = await resolveQuery('with x as (select 1) select * from x');

    expect(source.kind).toBe('inline');
  });

  it('rejects other statements', async () => {
    await expect(resolveQuery('drop table t')).rejects.toBeInstanceOf(QueryValidationError);
    await expect(resolveQuery('')).rejects.toBeInstanceOf(QueryValidationError);
  });

  it('gives the same key to skeletons that differ only after substitution', async () => {
    const first = await resolveQuery('select * from t where id = $id');
    const second = await resolveQuery('select * from t where id = $id ');

    expect(first.cacheKey).toBe(second.cacheKey);
  });
});
