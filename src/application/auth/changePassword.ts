import type { CredentialHasher } from '../../domain/auth/password.js';
import { PasswordPolicy } from '../../domain/auth/passwordPolicy.js';
import { InvalidCredentialsError, UserNotFoundError } from '../../domain/auth/errors.js';
import type { UserStore } from './ports.js';

export interface ChangePasswordCommand {
  userId: string;
  currentPassword: string;
  newPassword: string;
}

export class ChangePasswordUseCase {
  constructor(
    private userRepo: UserStore,
    private hasher: CredentialHasher
  ) {}

  async execute(command: ChangePasswordCommand): Promise<void> {
    const user = await this.userRepo.findById(command.userId);
    if (!user) {
      throw new UserNotFoundError();
    }

    const isValid = await this.hasher.verify(command.currentPassword, user.passwordHash);
    if (!isValid) {
      throw new InvalidCredentialsError('Current password is incorrect');
    }

    PasswordPolicy.assertValid(command.newPassword);

    const passwordHash = await this.hasher.hash(command.newPassword);
    await this.userRepo.updatePasswordHash(user.id, passwordHash);
  }
}
