import { randomBytes } from 'crypto';
import { InvalidApiKeyError, UserInactiveError, UserNotFoundError } from '../../domain/auth/errors.js';
import { toPrincipal, type Principal } from '../../domain/auth/user.js';
import type { UserStore } from './ports.js';

const API_KEY_BYTES = 32;

export function generateApiKey(): string {
  return randomBytes(API_KEY_BYTES).toString('base64url');
}

/**
 * Long-lived, non-expiring alternative credential. One live key per user;
 * issuing a new key invalidates the previous one.
 */
export class ApiKeyService {
  constructor(private users: UserStore) {}

  async issue(userId: string): Promise<string> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new UserNotFoundError();
    }

    const apiKey = generateApiKey();
    await this.users.updateApiKey(user.id, apiKey);
    return apiKey;
  }

  async authenticate(presentedKey: string): Promise<Principal> {
    if (presentedKey.length === 0) {
      throw new InvalidApiKeyError();
    }

    const user = await this.users.findByApiKey(presentedKey);
    if (!user) {
      throw new InvalidApiKeyError();
    }
    if (!user.isActive) {
      throw new UserInactiveError();
    }

    return toPrincipal(user);
  }
}
