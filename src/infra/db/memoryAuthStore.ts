import { randomUUID } from 'crypto';
import { Clock, systemClock } from '../../domain/auth/clock.js';
import { RegistrationConflictError } from '../../domain/auth/errors.js';
import type { NewUser, User } from '../../domain/auth/user.js';
import {
  TOP_USERS_LIMIT,
  type AuthStore,
  type DailyUsage,
  type RevokedToken,
  type TopUser,
  type UsageRecord,
  type UsageSummary,
} from '../../application/auth/ports.js';

type MutableUser = { -readonly [K in keyof User]: User[K] };

/**
 * Process-local store for development and tests. Every mutation finishes
 * within a single synchronous section, so check-then-insert is atomic.
 */
export class InMemoryAuthStore implements AuthStore {
  private users = new Map<string, MutableUser>();
  private order: string[] = [];
  private revoked = new Map<string, RevokedToken>();
  private usage: UsageRecord[] = [];

  constructor(private clock: Clock = systemClock) {}

  async ping(): Promise<void> {}

  async findById(id: string): Promise<User | null> {
    return this.snapshot(this.users.get(id));
  }

  async findByIdentifier(identifier: string): Promise<User | null> {
    return this.snapshot(
      this.findWhere((u) => sameText(u.username, identifier)) ??
        this.findWhere((u) => sameText(u.email, identifier))
    );
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.snapshot(this.findWhere((u) => sameText(u.username, username)));
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.snapshot(this.findWhere((u) => sameText(u.email, email)));
  }

  async findByApiKey(apiKey: string): Promise<User | null> {
    return this.snapshot(this.findWhere((u) => u.apiKey === apiKey));
  }

  async create(user: NewUser): Promise<User> {
    if (this.findWhere((u) => sameText(u.username, user.username))) {
      throw new RegistrationConflictError('username');
    }
    if (this.findWhere((u) => sameText(u.email, user.email))) {
      throw new RegistrationConflictError('email');
    }
    if (this.findWhere((u) => u.apiKey === user.apiKey)) {
      throw new Error('API key collision');
    }

    const created: MutableUser = {
      id: randomUUID(),
      username: user.username,
      email: user.email,
      passwordHash: user.passwordHash,
      role: user.role,
      isActive: true,
      apiKey: user.apiKey,
      company: user.company ?? null,
      fullName: user.fullName ?? null,
      createdAt: this.clock.now(),
      lastLogin: null,
    };
    this.users.set(created.id, created);
    this.order.push(created.id);
    return { ...created };
  }

  async updateLastLogin(id: string, at: Date): Promise<void> {
    this.update(id, (u) => {
      u.lastLogin = at;
    });
  }

  async updatePasswordHash(id: string, passwordHash: string): Promise<void> {
    this.update(id, (u) => {
      u.passwordHash = passwordHash;
    });
  }

  async updateApiKey(id: string, apiKey: string): Promise<void> {
    if (this.findWhere((u) => u.apiKey === apiKey && u.id !== id)) {
      throw new Error('API key collision');
    }
    this.update(id, (u) => {
      u.apiKey = apiKey;
    });
  }

  async setActive(id: string, active: boolean): Promise<void> {
    this.update(id, (u) => {
      u.isActive = active;
    });
  }

  /** Role changes have no public operation; used by seeding and tests. */
  async setRole(id: string, role: User['role']): Promise<void> {
    this.update(id, (u) => {
      u.role = role;
    });
  }

  async count(): Promise<number> {
    return this.users.size;
  }

  async countActive(): Promise<number> {
    return [...this.users.values()].filter((u) => u.isActive).length;
  }

  async list(): Promise<User[]> {
    // Insertion order breaks ties between equal creation times
    return this.order
      .map((id, seq) => ({ user: this.users.get(id), seq }))
      .filter((entry): entry is { user: MutableUser; seq: number } => entry.user !== undefined)
      .sort(
        (a, b) => b.user.createdAt.getTime() - a.user.createdAt.getTime() || b.seq - a.seq
      )
      .map(({ user }) => ({ ...user }));
  }

  async revoke(entry: RevokedToken): Promise<void> {
    if (!this.revoked.has(entry.tokenId)) {
      this.revoked.set(entry.tokenId, { ...entry });
    }
  }

  async isRevoked(tokenId: string): Promise<boolean> {
    return this.revoked.has(tokenId);
  }

  async pruneExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const [tokenId, entry] of this.revoked) {
      if (entry.expiresAt.getTime() <= now.getTime()) {
        this.revoked.delete(tokenId);
        removed++;
      }
    }
    return removed;
  }

  async appendUsage(record: UsageRecord): Promise<void> {
    this.usage.push({ ...record });
  }

  async countUsageSince(userId: string, since: Date): Promise<number> {
    return this.usage.filter(
      (r) => r.userId === userId && r.timestamp.getTime() >= since.getTime()
    ).length;
  }

  async usageStats(since: Date): Promise<UsageSummary> {
    const recent = this.usage.filter((r) => r.timestamp.getTime() >= since.getTime());

    const byDate = new Map<string, { calls: number; users: Set<string> }>();
    const byUser = new Map<string, number>();
    for (const record of recent) {
      const date = record.timestamp.toISOString().slice(0, 10);
      const day = byDate.get(date) ?? { calls: 0, users: new Set<string>() };
      day.calls++;
      day.users.add(record.userId);
      byDate.set(date, day);
      byUser.set(record.userId, (byUser.get(record.userId) ?? 0) + 1);
    }

    const daily: DailyUsage[] = [...byDate.entries()]
      .map(([date, day]) => ({ date, calls: day.calls, users: day.users.size }))
      .sort((a, b) => b.date.localeCompare(a.date));

    const topUsers: TopUser[] = [];
    for (const [userId, calls] of byUser) {
      const user = this.users.get(userId);
      if (user) {
        topUsers.push({ username: user.username, calls });
      }
    }
    topUsers.sort((a, b) => b.calls - a.calls || a.username.localeCompare(b.username));

    return { daily, topUsers: topUsers.slice(0, TOP_USERS_LIMIT) };
  }

  private findWhere(predicate: (user: MutableUser) => boolean): MutableUser | undefined {
    for (const user of this.users.values()) {
      if (predicate(user)) {
        return user;
      }
    }
    return undefined;
  }

  private update(id: string, apply: (user: MutableUser) => void): void {
    const user = this.users.get(id);
    if (user) {
      apply(user);
    }
  }

  private snapshot(user: MutableUser | undefined): User | null {
    return user ? { ...user } : null;
  }
}

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
