import { describe, it, expect, beforeEach } from 'vitest';
import {
  TokenExpiredError,
  TokenRevokedError,
  UserInactiveError,
  WrongTokenTypeError,
} from '../../../domain/auth/errors.js';
import { createTestContext, STRONG_PASSWORD, type TestContext } from '../../../__tests__/helpers.js';
import type { LoginResult } from '../login.js';

describe('RefreshAccessUseCase', () => {
  let ctx: TestContext;
  let userId: string;
  let session: LoginResult;

  beforeEach(async () => {
    ctx = createTestContext();
    const registered = await ctx.services.register.execute({
      username: 'alice',
      email: 'alice@example.com',
      password: STRONG_PASSWORD,
    });
    userId = registered.userId;
    session = await ctx.services.login.execute({ identifier: 'alice', password: STRONG_PASSWORD });
  });

  it('should issue a new access token and hand back the same refresh token', async () => {
    const result = await ctx.services.refresh.execute(session.refreshToken);

    expect(result.refreshToken).toBe(session.refreshToken);
    expect(result.tokenType).toBe('bearer');
    expect(result.expiresInSeconds).toBe(3600);
    expect(result.accessToken).not.toBe(session.accessToken);
    await expect(
      ctx.services.tokens.verify(result.accessToken, 'access')
    ).resolves.toMatchObject({ uid: userId, sub: 'alice' });
  });

  it('should carry the current role rather than the one at login', async () => {
    await ctx.store.setRole(userId, 'admin');

    const result = await ctx.services.refresh.execute(session.refreshToken);

    await expect(
      ctx.services.tokens.verify(result.accessToken, 'access')
    ).resolves.toMatchObject({ role: 'admin' });
  });

  it('should keep working after the access token expired', async () => {
    ctx.clock.advance(2 * 3600 * 1000);

    const result = await ctx.services.refresh.execute(session.refreshToken);

    await expect(
      ctx.services.tokens.verify(result.accessToken, 'access')
    ).resolves.toMatchObject({ uid: userId });
  });

  it('should reject an expired refresh token', async () => {
    ctx.clock.advance(86400 * 1000);

    await expect(ctx.services.refresh.execute(session.refreshToken)).rejects.toBeInstanceOf(
      TokenExpiredError
    );
  });

  it('should reject an access token', async () => {
    await expect(ctx.services.refresh.execute(session.accessToken)).rejects.toBeInstanceOf(
      WrongTokenTypeError
    );
  });

  it('should reject a revoked refresh token', async () => {
    await ctx.services.tokens.revoke(session.refreshToken);

    await expect(ctx.services.refresh.execute(session.refreshToken)).rejects.toBeInstanceOf(
      TokenRevokedError
    );
  });

  it('should reject a deactivated user', async () => {
    await ctx.store.setActive(userId, false);

    await expect(ctx.services.refresh.execute(session.refreshToken)).rejects.toBeInstanceOf(
      UserInactiveError
    );
  });
});
