import 'dotenv/config';
import { loadConfig } from '../config.js';
import { logger } from '../logger.js';
import { createPool } from '../db/pool.js';
import { PgAuthStore } from '../db/pgAuthStore.js';
import { InMemoryAuthStore } from '../db/memoryAuthStore.js';
import { GuardedAuthStore } from '../db/guardedStore.js';
import type { AuthStore } from '../../application/auth/ports.js';
import { Password } from '../../domain/auth/password.js';
import { createServices } from '../services.js';
import { createApp } from './app.js';

const config = loadConfig();

const pool = config.databaseUrl
  ? createPool({ connectionString: config.databaseUrl, queryTimeoutMs: config.storage.timeoutMs })
  : null;

let backend: AuthStore;
if (pool) {
  backend = new PgAuthStore(pool);
} else {
  logger.warn({}, 'DATABASE_URL not set; using the in-memory store (data is lost on restart)');
  backend = new InMemoryAuthStore();
}

const services = createServices({
  store: new GuardedAuthStore(backend, config.storage),
  jwt: config.jwt,
  hasher: new Password(config.argon2),
});

const app = createApp(services, {
  rateLimit: config.rateLimit,
  healthTimeoutMs: config.storage.timeoutMs,
});

// Expired revocations are pruned off the request path
const pruneTimer =
  config.revocationPruneIntervalMs > 0
    ? setInterval(() => {
        services.tokens
          .pruneRevoked()
          .then((removed) => {
            if (removed > 0) {
              logger.info({ removed }, 'Pruned expired token revocations');
            }
          })
          .catch((err: unknown) => {
            logger.error({ err }, 'Failed to prune token revocations');
          });
      }, config.revocationPruneIntervalMs)
    : null;
pruneTimer?.unref();

// Start server
const server = app.listen(config.port, () => {
  logger.info({ port: config.port }, `Server running on http://localhost:${config.port}`);
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down');
  if (pruneTimer) {
    clearInterval(pruneTimer);
  }
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await services.usageRecorder.flush();
  await pool?.end();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  });
}

export default app;
