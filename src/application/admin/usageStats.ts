import { Clock, systemClock } from '../../domain/auth/clock.js';
import type { DailyUsage, TopUser, UsageStore, UserStore } from '../auth/ports.js';

export interface UsageStatsResult {
  totalUsers: number;
  activeUsers: number;
  sinceDays: number;
  daily: DailyUsage[];
  topUsers: TopUser[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class UsageStatsUseCase {
  constructor(
    private userRepo: UserStore,
    private usage: UsageStore,
    private clock: Clock = systemClock
  ) {}

  async execute(sinceDays: number): Promise<UsageStatsResult> {
    const since = new Date(this.clock.now().getTime() - sinceDays * DAY_MS);

    const [totalUsers, activeUsers, summary] = await Promise.all([
      this.userRepo.count(),
      this.userRepo.countActive(),
      this.usage.usageStats(since),
    ]);

    return {
      totalUsers,
      activeUsers,
      sinceDays,
      daily: summary.daily,
      topUsers: summary.topUsers,
    };
  }
}
