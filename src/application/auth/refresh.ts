import { UserInactiveError, UserNotFoundError } from '../../domain/auth/errors.js';
import { toPrincipal } from '../../domain/auth/user.js';
import type { TokenService } from './tokenService.js';
import type { UserStore } from './ports.js';

export interface RefreshResult {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
  expiresInSeconds: number;
}

/**
 * Exchange a refresh token for a new access token. The user is re-read so
 * the new token carries the current role, not the one in the old token.
 */
export class RefreshAccessUseCase {
  constructor(
    private userRepo: UserStore,
    private tokens: TokenService
  ) {}

  async execute(refreshToken: string): Promise<RefreshResult> {
    const claims = await this.tokens.verify(refreshToken, 'refresh');

    const user = await this.userRepo.findById(claims.uid);
    if (!user) {
      throw new UserNotFoundError();
    }
    if (!user.isActive) {
      throw new UserInactiveError();
    }

    const access = this.tokens.issueAccessToken(toPrincipal(user));

    return {
      accessToken: access.token,
      refreshToken,
      tokenType: 'bearer',
      expiresInSeconds: this.tokens.accessTokenTtlSeconds,
    };
  }
}
