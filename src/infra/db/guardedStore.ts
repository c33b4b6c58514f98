import { setTimeout as sleep } from 'timers/promises';
import { DomainError } from '../../domain/auth/errors.js';
import type { NewUser, User } from '../../domain/auth/user.js';
import { StorageUnavailableError } from '../../application/errors.js';
import type {
  AuthStore,
  RevokedToken,
  UsageRecord,
  UsageSummary,
} from '../../application/auth/ports.js';
import { logger as rootLogger, type SafeLogger } from '../logger.js';

export interface StorageGuardOptions {
  timeoutMs: number;
  /** Extra attempts for idempotent reads. Writes are never retried. */
  readRetries: number;
  retryBaseDelayMs: number;
}

class StorageTimeoutError extends Error {
  constructor(ms: number) {
    super(`Storage call exceeded ${ms}ms`);
    this.name = 'StorageTimeoutError';
  }
}

/**
 * Helper to add timeout to a promise.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StorageTimeoutError(ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Bounds every storage call with a timeout and retries idempotent reads with
 * exponential backoff. Failures surface as StorageUnavailableError; domain
 * errors raised by the backend (e.g. registration conflicts) pass through.
 */
export class GuardedAuthStore implements AuthStore {
  constructor(
    private inner: AuthStore,
    private options: StorageGuardOptions,
    private logger: SafeLogger = rootLogger.child({ component: 'storage-guard' })
  ) {}

  ping(): Promise<void> {
    return this.write('ping', () => this.inner.ping());
  }

  findById(id: string): Promise<User | null> {
    return this.read('findById', () => this.inner.findById(id));
  }

  findByIdentifier(identifier: string): Promise<User | null> {
    return this.read('findByIdentifier', () => this.inner.findByIdentifier(identifier));
  }

  findByUsername(username: string): Promise<User | null> {
    return this.read('findByUsername', () => this.inner.findByUsername(username));
  }

  findByEmail(email: string): Promise<User | null> {
    return this.read('findByEmail', () => this.inner.findByEmail(email));
  }

  findByApiKey(apiKey: string): Promise<User | null> {
    return this.read('findByApiKey', () => this.inner.findByApiKey(apiKey));
  }

  create(user: NewUser): Promise<User> {
    return this.write('create', () => this.inner.create(user));
  }

  updateLastLogin(id: string, at: Date): Promise<void> {
    return this.write('updateLastLogin', () => this.inner.updateLastLogin(id, at));
  }

  updatePasswordHash(id: string, passwordHash: string): Promise<void> {
    return this.write('updatePasswordHash', () => this.inner.updatePasswordHash(id, passwordHash));
  }

  updateApiKey(id: string, apiKey: string): Promise<void> {
    return this.write('updateApiKey', () => this.inner.updateApiKey(id, apiKey));
  }

  setActive(id: string, active: boolean): Promise<void> {
    return this.write('setActive', () => this.inner.setActive(id, active));
  }

  count(): Promise<number> {
    return this.read('count', () => this.inner.count());
  }

  countActive(): Promise<number> {
    return this.read('countActive', () => this.inner.countActive());
  }

  list(): Promise<User[]> {
    return this.read('list', () => this.inner.list());
  }

  revoke(entry: RevokedToken): Promise<void> {
    return this.write('revoke', () => this.inner.revoke(entry));
  }

  isRevoked(tokenId: string): Promise<boolean> {
    return this.read('isRevoked', () => this.inner.isRevoked(tokenId));
  }

  pruneExpired(now: Date): Promise<number> {
    return this.write('pruneExpired', () => this.inner.pruneExpired(now));
  }

  appendUsage(record: UsageRecord): Promise<void> {
    return this.write('appendUsage', () => this.inner.appendUsage(record));
  }

  countUsageSince(userId: string, since: Date): Promise<number> {
    return this.read('countUsageSince', () => this.inner.countUsageSince(userId, since));
  }

  usageStats(since: Date): Promise<UsageSummary> {
    return this.read('usageStats', () => this.inner.usageStats(since));
  }

  private async read<T>(operation: string, call: () => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let attempt = 0; attempt <= this.options.readRetries; attempt++) {
      if (attempt > 0) {
        await sleep(this.options.retryBaseDelayMs * 2 ** (attempt - 1));
      }
      try {
        return await withTimeout(call(), this.options.timeoutMs);
      } catch (error) {
        if (error instanceof DomainError) {
          throw error;
        }
        lastError = error;
        this.logger.warn({ operation, attempt, err: error }, 'Storage read failed');
      }
    }
    throw new StorageUnavailableError(operation, { cause: lastError });
  }

  private async write<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(call(), this.options.timeoutMs);
    } catch (error) {
      if (error instanceof DomainError) {
        throw error;
      }
      this.logger.error({ operation, err: error }, 'Storage write failed');
      throw new StorageUnavailableError(operation, { cause: error });
    }
  }
}
