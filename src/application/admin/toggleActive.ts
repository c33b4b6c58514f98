import { NotFoundError } from '../errors.js';
import type { UserStore } from '../auth/ports.js';

export interface ToggleActiveResult {
  userId: string;
  isActive: boolean;
}

/**
 * Flip a user's activation flag. Deactivated users can no longer log in,
 * and their live access tokens and API key stop authenticating.
 */
export class ToggleActiveUseCase {
  constructor(private userRepo: UserStore) {}

  async execute(userId: string): Promise<ToggleActiveResult> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const isActive = !user.isActive;
    await this.userRepo.setActive(user.id, isActive);

    return { userId: user.id, isActive };
  }
}
