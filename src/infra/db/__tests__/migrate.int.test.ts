import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Pool } from 'pg';
import { createPool } from '../pool.js';
import { migrate } from '../migrate.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('migrate', () => {
  let pool: Pool;
  let dir: string;

  beforeAll(async () => {
    pool = createPool({ connectionString: process.env.DATABASE_URL ?? '', queryTimeoutMs: 5000 });
    dir = await mkdtemp(join(tmpdir(), 'migrations-'));
    await writeFile(
      join(dir, '9001_scratch.sql'),
      'CREATE TABLE migrate_scratch (id INT PRIMARY KEY)'
    );
  });

  afterAll(async () => {
    await pool.query('DROP TABLE IF EXISTS migrate_scratch');
    await pool.query('DELETE FROM schema_migrations WHERE version = 9001');
    await pool.end();
    await rm(dir, { recursive: true, force: true });
  });

  it('should load and apply files from the directory it was given', async () => {
    await expect(migrate(pool, dir)).resolves.toBe(1);

    const result = await pool.query<{ version: number }>(
      'SELECT version FROM schema_migrations WHERE version = 9001'
    );
    expect(result.rows).toEqual([{ version: 9001 }]);
    await expect(pool.query('SELECT id FROM migrate_scratch')).resolves.toMatchObject({
      rowCount: 0,
    });
  });

  it('should skip migrations that were already applied', async () => {
    await expect(migrate(pool, dir)).resolves.toBe(0);
  });
});
