import { Clock, systemClock } from '../../domain/auth/clock.js';
import { logger as rootLogger, type SafeLogger } from '../../infra/logger.js';
import type { UsageStore } from './ports.js';

/**
 * Best-effort usage accounting. `record` never throws and never makes the
 * caller wait; storage failures are logged and dropped.
 */
export class UsageRecorder {
  private inFlight = new Set<Promise<void>>();

  constructor(
    private store: UsageStore,
    private clock: Clock = systemClock,
    private logger: SafeLogger = rootLogger.child({ component: 'usage-recorder' })
  ) {}

  record(userId: string, endpoint: string, statusCode: number, durationMs: number): void {
    const write = this.append(userId, endpoint, statusCode, durationMs);
    this.inFlight.add(write);
    void write.finally(() => this.inFlight.delete(write));
  }

  /** Resolves once every write started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private async append(
    userId: string,
    endpoint: string,
    statusCode: number,
    durationMs: number
  ): Promise<void> {
    try {
      await this.store.appendUsage({
        userId,
        endpoint,
        statusCode,
        durationMs: Math.max(0, Math.round(durationMs)),
        timestamp: this.clock.now(),
      });
    } catch (error) {
      this.logger.warn({ userId, endpoint, err: error }, 'Failed to record usage');
    }
  }
}
