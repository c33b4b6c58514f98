import { describe, it, expect, beforeEach } from 'vitest';
import {
  TokenMalformedError,
  TokenRevokedError,
  WrongTokenTypeError,
} from '../../../domain/auth/errors.js';
import type { Principal } from '../../../domain/auth/user.js';
import { ForbiddenError } from '../../errors.js';
import { createTestContext, STRONG_PASSWORD, type TestContext } from '../../../__tests__/helpers.js';
import type { LoginResult } from '../login.js';

describe('LogoutUseCase', () => {
  let ctx: TestContext;
  let alice: Principal;
  let session: LoginResult;

  async function signUp(username: string): Promise<{ principal: Principal; session: LoginResult }> {
    const registered = await ctx.services.register.execute({
      username,
      email: `${username}@example.com`,
      password: STRONG_PASSWORD,
    });
    const login = await ctx.services.login.execute({
      identifier: username,
      password: STRONG_PASSWORD,
    });
    return {
      principal: { userId: registered.userId, username, role: 'user' },
      session: login,
    };
  }

  beforeEach(async () => {
    ctx = createTestContext();
    ({ principal: alice, session } = await signUp('alice'));
  });

  it('should revoke the access token', async () => {
    await ctx.services.logout.execute(alice, { accessToken: session.accessToken });

    await expect(
      ctx.services.tokens.verify(session.accessToken, 'access')
    ).rejects.toBeInstanceOf(TokenRevokedError);
    // refresh token untouched when not supplied
    await expect(
      ctx.services.tokens.verify(session.refreshToken, 'refresh')
    ).resolves.toMatchObject({ uid: alice.userId });
  });

  it('should revoke the refresh token when supplied', async () => {
    await ctx.services.logout.execute(alice, {
      accessToken: session.accessToken,
      refreshToken: session.refreshToken,
    });

    await expect(ctx.services.refresh.execute(session.refreshToken)).rejects.toBeInstanceOf(
      TokenRevokedError
    );
  });

  it('should refuse a refresh token belonging to someone else and revoke nothing', async () => {
    const bob = await signUp('bob');

    await expect(
      ctx.services.logout.execute(alice, {
        accessToken: session.accessToken,
        refreshToken: bob.session.refreshToken,
      })
    ).rejects.toBeInstanceOf(ForbiddenError);

    await expect(
      ctx.services.tokens.verify(session.accessToken, 'access')
    ).resolves.toMatchObject({ uid: alice.userId });
    await expect(
      ctx.services.tokens.verify(bob.session.refreshToken, 'refresh')
    ).resolves.toMatchObject({ uid: bob.principal.userId });
  });

  it('should refuse an invalid refresh token and revoke nothing', async () => {
    await expect(
      ctx.services.logout.execute(alice, {
        accessToken: session.accessToken,
        refreshToken: 'garbage',
      })
    ).rejects.toBeInstanceOf(TokenMalformedError);

    await expect(
      ctx.services.tokens.verify(session.accessToken, 'access')
    ).resolves.toMatchObject({ uid: alice.userId });
  });

  it('should end the session when the refresh token has already expired', async () => {
    // refresh lives 86400s, access 3600s: re-login late so the access token outlives it
    ctx.clock.advance(86400 * 1000 - 1800 * 1000);
    const late = await ctx.services.login.execute({
      identifier: 'alice',
      password: STRONG_PASSWORD,
    });
    ctx.clock.advance(1800 * 1000);

    await ctx.services.logout.execute(alice, {
      accessToken: late.accessToken,
      refreshToken: session.refreshToken,
    });

    await expect(ctx.services.tokens.verify(late.accessToken, 'access')).rejects.toBeInstanceOf(
      TokenRevokedError
    );
  });

  it('should end the session when the refresh token was already revoked', async () => {
    await ctx.services.tokens.revoke(session.refreshToken);

    await ctx.services.logout.execute(alice, {
      accessToken: session.accessToken,
      refreshToken: session.refreshToken,
    });

    await expect(
      ctx.services.tokens.verify(session.accessToken, 'access')
    ).rejects.toBeInstanceOf(TokenRevokedError);
  });

  it('should refuse an access token passed as the refresh token', async () => {
    const other = await ctx.services.login.execute({
      identifier: 'alice',
      password: STRONG_PASSWORD,
    });

    await expect(
      ctx.services.logout.execute(alice, {
        accessToken: session.accessToken,
        refreshToken: other.accessToken,
      })
    ).rejects.toBeInstanceOf(WrongTokenTypeError);

    await expect(
      ctx.services.tokens.verify(session.accessToken, 'access')
    ).resolves.toMatchObject({ uid: alice.userId });
  });
});
