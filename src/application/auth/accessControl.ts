import { AuthError, UserInactiveError, UserNotFoundError } from '../../domain/auth/errors.js';
import { toPrincipal, type Principal, type Role } from '../../domain/auth/user.js';
import { ForbiddenError, UnauthorizedError } from '../errors.js';
import { logger as rootLogger, type SafeLogger } from '../../infra/logger.js';
import type { ApiKeyService } from './apiKeyService.js';
import type { TokenService } from './tokenService.js';
import type { UserStore } from './ports.js';

export type Credential = { kind: 'bearer'; token: string } | { kind: 'apiKey'; key: string };

/**
 * Resolves request credentials to a {@link Principal} and enforces roles.
 * Callers only ever see UnauthorizedError; the specific failure is logged.
 */
export class AccessControl {
  constructor(
    private tokens: TokenService,
    private apiKeys: ApiKeyService,
    private users: UserStore,
    private logger: SafeLogger = rootLogger.child({ component: 'access-control' })
  ) {}

  async authenticate(credential: Credential): Promise<Principal> {
    try {
      return credential.kind === 'bearer'
        ? await this.authenticateBearer(credential.token)
        : await this.apiKeys.authenticate(credential.key);
    } catch (error) {
      if (error instanceof AuthError) {
        this.logger.warn(
          { credential: credential.kind, reason: error.code },
          'Authentication rejected'
        );
        throw new UnauthorizedError();
      }
      throw error;
    }
  }

  requireRole(principal: Principal, role: Role): void {
    if (principal.role !== role) {
      this.logger.warn(
        { userId: principal.userId, role: principal.role, required: role },
        'Role check failed'
      );
      throw new ForbiddenError();
    }
  }

  private async authenticateBearer(token: string): Promise<Principal> {
    const claims = await this.tokens.verify(token, 'access');

    // The stored user wins over the claims: deactivation and role changes
    // apply to tokens that are still within their TTL.
    const user = await this.users.findById(claims.uid);
    if (!user) {
      throw new UserNotFoundError();
    }
    if (!user.isActive) {
      throw new UserInactiveError();
    }

    return toPrincipal(user);
  }
}
