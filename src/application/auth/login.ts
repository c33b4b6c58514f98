import { randomUUID } from 'crypto';
import type { CredentialHasher } from '../../domain/auth/password.js';
import { AccountInactiveError, InvalidCredentialsError } from '../../domain/auth/errors.js';
import { Clock, systemClock } from '../../domain/auth/clock.js';
import { toPrincipal } from '../../domain/auth/user.js';
import type { TokenService } from './tokenService.js';
import type { UserStore } from './ports.js';

export interface LoginCommand {
  /** username or email */
  identifier: string;
  password: string;
}

export interface LoginResult {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
  expiresInSeconds: number;
}

export class LoginUseCase {
  private dummyHash?: Promise<string>;

  constructor(
    private userRepo: UserStore,
    private hasher: CredentialHasher,
    private tokens: TokenService,
    private clock: Clock = systemClock
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    // Find user
    const user = await this.userRepo.findByIdentifier(command.identifier.trim());
    if (!user) {
      // Spend the same hashing time as a real check so unknown names are not told apart
      this.dummyHash ??= this.hasher.hash(randomUUID());
      await this.hasher.verify(command.password, await this.dummyHash);
      throw new InvalidCredentialsError();
    }

    // Verify password
    const isValid = await this.hasher.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    if (!user.isActive) {
      throw new AccountInactiveError();
    }

    await this.userRepo.updateLastLogin(user.id, this.clock.now());

    const principal = toPrincipal(user);
    const access = this.tokens.issueAccessToken(principal);
    const refresh = this.tokens.issueRefreshToken(principal);

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      tokenType: 'bearer',
      expiresInSeconds: this.tokens.accessTokenTtlSeconds,
    };
  }
}
