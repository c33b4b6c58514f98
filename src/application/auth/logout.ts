import type { Principal } from '../../domain/auth/user.js';
import { ForbiddenError } from '../errors.js';
import type { TokenService } from './tokenService.js';

export interface LogoutCommand {
  accessToken: string;
  refreshToken?: string;
}

/**
 * Revoke the presented access token and, when given, the caller's refresh
 * token. Nothing is revoked if the refresh token is forged or not theirs;
 * an expired or already revoked one still lets the access token go.
 */
export class LogoutUseCase {
  constructor(private tokens: TokenService) {}

  async execute(principal: Principal, command: LogoutCommand): Promise<void> {
    if (command.refreshToken) {
      const claims = this.tokens.inspect(command.refreshToken, 'refresh');
      if (claims.uid !== principal.userId) {
        throw new ForbiddenError('Refresh token belongs to another user');
      }
    }

    await this.tokens.revoke(command.accessToken);
    if (command.refreshToken) {
      await this.tokens.revoke(command.refreshToken);
    }
  }
}
