import { toPublicUser, type PublicUser } from '../../domain/auth/user.js';
import type { UserStore } from '../auth/ports.js';

export class ListUsersUseCase {
  constructor(private userRepo: UserStore) {}

  async execute(): Promise<PublicUser[]> {
    const users = await this.userRepo.list();
    return users.map(toPublicUser);
  }
}
