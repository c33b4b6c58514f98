import { vi, type Mock } from 'vitest';
import type { Clock } from '../domain/auth/clock.js';
import { Password } from '../domain/auth/password.js';
import { InMemoryAuthStore } from '../infra/db/memoryAuthStore.js';
import { createServices, type Services } from '../infra/services.js';
import type { SafeLogger } from '../infra/logger.js';

export class FakeClock implements Clock {
  private current: number;

  constructor(start = '2025-03-10T12:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(iso: string): void {
    this.current = new Date(iso).getTime();
  }
}

// Minimum argon2 cost so the suite stays fast
export const fastHasher = new Password({ timeCost: 2, memoryCost: 4096 });

export const TEST_JWT = {
  secret: 'test-secret-0123456789',
  accessTokenTtlSeconds: 3600,
  refreshTokenTtlSeconds: 86400,
};

export const STRONG_PASSWORD = 'Abcd123!';

export interface TestContext {
  clock: FakeClock;
  store: InMemoryAuthStore;
  services: Services;
}

export function createTestContext(): TestContext {
  const clock = new FakeClock();
  const store = new InMemoryAuthStore(clock);
  const services = createServices({ store, jwt: TEST_JWT, hasher: fastHasher, clock });
  return { clock, store, services };
}

export interface SpyLogger extends SafeLogger {
  info: Mock;
  warn: Mock;
  error: Mock;
  debug: Mock;
}

export function createSpyLogger(): SpyLogger {
  const logger: SpyLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: () => logger,
  };
  return logger;
}
