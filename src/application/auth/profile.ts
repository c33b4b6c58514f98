import { Clock, systemClock } from '../../domain/auth/clock.js';
import type { Role } from '../../domain/auth/user.js';
import { NotFoundError } from '../errors.js';
import type { UsageStore, UserStore } from './ports.js';

export interface ProfileResult {
  username: string;
  email: string;
  company: string | null;
  fullName: string | null;
  role: Role;
  createdAt: Date;
  lastLogin: Date | null;
  apiCallsToday: number;
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export class GetProfileUseCase {
  constructor(
    private userRepo: UserStore,
    private usage: UsageStore,
    private clock: Clock = systemClock
  ) {}

  async execute(userId: string): Promise<ProfileResult> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const apiCallsToday = await this.usage.countUsageSince(
      user.id,
      startOfUtcDay(this.clock.now())
    );

    return {
      username: user.username,
      email: user.email,
      company: user.company,
      fullName: user.fullName,
      role: user.role,
      createdAt: user.createdAt,
      lastLogin: user.lastLogin,
      apiCallsToday,
    };
  }
}
