import jwt, { type JwtPayload } from 'jsonwebtoken';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { Clock, epochSeconds, systemClock } from '../../domain/auth/clock.js';
import {
  TokenExpiredError,
  TokenMalformedError,
  TokenRevokedError,
  WrongTokenTypeError,
} from '../../domain/auth/errors.js';
import { ROLES, type Principal, type Role } from '../../domain/auth/user.js';
import type { RevocationStore } from './ports.js';

export type TokenType = 'access' | 'refresh';

export interface TokenClaims {
  /** username */
  sub: string;
  uid: string;
  role: Role;
  type: TokenType;
  /** revocation identifier */
  jti: string;
  iat: number;
  exp: number;
}

export interface IssuedToken {
  token: string;
  tokenId: string;
  expiresAt: Date;
}

export interface TokenServiceOptions {
  secret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  clock?: Clock;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  uid: z.string().min(1),
  role: z.enum(ROLES),
  type: z.enum(['access', 'refresh']),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

const ALGORITHM = 'HS256';

/**
 * Signs and verifies access/refresh JWTs and owns the revocation list.
 *
 * A token moves from valid to expired or revoked and never back.
 */
export class TokenService {
  private readonly clock: Clock;

  constructor(
    private options: TokenServiceOptions,
    private revocations: RevocationStore
  ) {
    this.clock = options.clock ?? systemClock;
  }

  get accessTokenTtlSeconds(): number {
    return this.options.accessTokenTtlSeconds;
  }

  issueAccessToken(principal: Principal): IssuedToken {
    return this.issue(principal, 'access', this.options.accessTokenTtlSeconds);
  }

  issueRefreshToken(principal: Principal): IssuedToken {
    return this.issue(principal, 'refresh', this.options.refreshTokenTtlSeconds);
  }

  /**
   * Verify a token and return its claims.
   *
   * @throws TokenMalformedError bad signature or claims
   * @throws TokenExpiredError past `exp`
   * @throws WrongTokenTypeError `type` differs from `expectedType`
   * @throws TokenRevokedError the token id is in the revocation set
   */
  async verify(token: string, expectedType: TokenType): Promise<TokenClaims> {
    const claims = this.decode(token, false);

    if (claims.type !== expectedType) {
      throw new WrongTokenTypeError(expectedType, claims.type);
    }

    if (await this.revocations.isRevoked(claims.jti)) {
      throw new TokenRevokedError();
    }

    return claims;
  }

  /**
   * Claims of a correctly signed token of `expectedType`, whether or not it
   * has expired or been revoked. For ownership checks only, never for access.
   *
   * @throws TokenMalformedError bad signature or claims
   * @throws WrongTokenTypeError `type` differs from `expectedType`
   */
  inspect(token: string, expectedType: TokenType): TokenClaims {
    const claims = this.decode(token, true);
    if (claims.type !== expectedType) {
      throw new WrongTokenTypeError(expectedType, claims.type);
    }
    return claims;
  }

  /**
   * Add the token's id to the revocation set, keeping its original expiry so
   * the entry can be pruned afterwards. Already-expired tokens need no entry.
   */
  async revoke(token: string): Promise<void> {
    const claims = this.decode(token, true);
    const expiresAt = new Date(claims.exp * 1000);
    if (expiresAt.getTime() <= this.clock.now().getTime()) {
      return;
    }
    await this.revocations.revoke({
      tokenId: claims.jti,
      userId: claims.uid,
      expiresAt,
    });
  }

  async pruneRevoked(): Promise<number> {
    return await this.revocations.pruneExpired(this.clock.now());
  }

  private issue(principal: Principal, type: TokenType, ttlSeconds: number): IssuedToken {
    const iat = epochSeconds(this.clock.now());
    const claims: TokenClaims = {
      sub: principal.username,
      uid: principal.userId,
      role: principal.role,
      type,
      jti: randomUUID(),
      iat,
      exp: iat + ttlSeconds,
    };

    const token = jwt.sign(claims, this.options.secret, { algorithm: ALGORITHM });

    return {
      token,
      tokenId: claims.jti,
      expiresAt: new Date(claims.exp * 1000),
    };
  }

  private decode(token: string, ignoreExpiration: boolean): TokenClaims {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: epochSeconds(this.clock.now()),
        ignoreExpiration,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenExpiredError();
      }
      throw new TokenMalformedError();
    }

    const parsed = claimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenMalformedError();
    }
    return parsed.data;
  }
}
