import { z } from 'zod';
import type { CredentialHasher } from '../../domain/auth/password.js';
import { PasswordPolicy } from '../../domain/auth/passwordPolicy.js';
import { InvalidEmailError, RegistrationConflictError } from '../../domain/auth/errors.js';
import type { Role } from '../../domain/auth/user.js';
import { generateApiKey } from './apiKeyService.js';
import type { UserStore } from './ports.js';

export interface RegisterCommand {
  username: string;
  email: string;
  password: string;
  company?: string;
  fullName?: string;
  role?: Role;
}

export interface RegisterResult {
  userId: string;
  username: string;
  email: string;
  apiKey: string;
}

const emailSchema = z.string().email();

export class RegisterUseCase {
  constructor(
    private userRepo: UserStore,
    private hasher: CredentialHasher
  ) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    const username = command.username.trim();
    const email = command.email.trim();

    if (!emailSchema.safeParse(email).success) {
      throw new InvalidEmailError();
    }
    PasswordPolicy.assertValid(command.password);

    // Early, specific conflict; the store's unique constraint still decides races
    if (await this.userRepo.findByUsername(username)) {
      throw new RegistrationConflictError('username');
    }
    if (await this.userRepo.findByEmail(email)) {
      throw new RegistrationConflictError('email');
    }

    const passwordHash = await this.hasher.hash(command.password);
    const apiKey = generateApiKey();

    const user = await this.userRepo.create({
      username,
      email,
      passwordHash,
      role: command.role ?? 'user',
      apiKey,
      company: command.company ?? null,
      fullName: command.fullName ?? null,
    });

    return {
      userId: user.id,
      username: user.username,
      email: user.email,
      apiKey,
    };
  }
}
