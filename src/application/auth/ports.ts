import type { NewUser, User } from '../../domain/auth/user.js';

/**
 * Persistence contract for user records. Implementations must enforce
 * username/email/api-key uniqueness atomically at the storage level.
 */
export interface UserStore {
  findById(id: string): Promise<User | null>;
  /** Match by username or email, case-insensitive. */
  findByIdentifier(identifier: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByApiKey(apiKey: string): Promise<User | null>;
  /** @throws RegistrationConflictError when username or email exists. */
  create(user: NewUser): Promise<User>;
  updateLastLogin(id: string, at: Date): Promise<void>;
  updatePasswordHash(id: string, passwordHash: string): Promise<void>;
  updateApiKey(id: string, apiKey: string): Promise<void>;
  setActive(id: string, active: boolean): Promise<void>;
  count(): Promise<number>;
  countActive(): Promise<number>;
  /** All users, newest first. */
  list(): Promise<User[]>;
}

export interface RevokedToken {
  tokenId: string;
  userId: string;
  expiresAt: Date;
}

export interface RevocationStore {
  /** Idempotent: revoking the same id twice is not an error. */
  revoke(entry: RevokedToken): Promise<void>;
  isRevoked(tokenId: string): Promise<boolean>;
  /** Deletes revocations whose expiry is at or before `now`; returns how many. */
  pruneExpired(now: Date): Promise<number>;
}

export interface UsageRecord {
  userId: string;
  endpoint: string;
  statusCode: number;
  durationMs: number;
  timestamp: Date;
}

export interface DailyUsage {
  /** UTC calendar date, YYYY-MM-DD */
  date: string;
  calls: number;
  users: number;
}

export interface TopUser {
  username: string;
  calls: number;
}

export interface UsageSummary {
  daily: DailyUsage[];
  topUsers: TopUser[];
}

export interface UsageStore {
  appendUsage(record: UsageRecord): Promise<void>;
  countUsageSince(userId: string, since: Date): Promise<number>;
  usageStats(since: Date): Promise<UsageSummary>;
}

export interface AuthStore extends UserStore, RevocationStore, UsageStore {
  ping(): Promise<void>;
}

export const TOP_USERS_LIMIT = 10;
