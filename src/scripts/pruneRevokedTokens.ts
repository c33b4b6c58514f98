import 'dotenv/config';
import { fileURLToPath } from 'url';
import { systemClock } from '../domain/auth/clock.js';
import { createPool } from '../infra/db/pool.js';
import { PgAuthStore } from '../infra/db/pgAuthStore.js';
import type { RevocationStore } from '../application/auth/ports.js';

export async function pruneRevokedTokens(store: RevocationStore, now = systemClock.now()): Promise<number> {
  return await store.pruneExpired(now);
}

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = createPool({ connectionString, queryTimeoutMs: 30000 });
  try {
    const removed = await pruneRevokedTokens(new PgAuthStore(pool));
    console.log(`✓ Removed ${removed} expired revocation(s)`);
  } finally {
    await pool.end();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('Prune failed:', error);
    process.exit(1);
  });
}
