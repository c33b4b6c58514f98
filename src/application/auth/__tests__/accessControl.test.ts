import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AccessControl } from '../accessControl.js';
import { ForbiddenError, StorageUnavailableError, UnauthorizedError } from '../../errors.js';
import {
  createSpyLogger,
  createTestContext,
  STRONG_PASSWORD,
  type SpyLogger,
  type TestContext,
} from '../../../__tests__/helpers.js';

describe('AccessControl', () => {
  let ctx: TestContext;
  let logger: SpyLogger;
  let access: AccessControl;
  let userId: string;
  let apiKey: string;

  beforeEach(async () => {
    ctx = createTestContext();
    logger = createSpyLogger();
    access = new AccessControl(ctx.services.tokens, ctx.services.apiKeys, ctx.store, logger);
    const registered = await ctx.services.register.execute({
      username: 'alice',
      email: 'alice@example.com',
      password: STRONG_PASSWORD,
    });
    userId = registered.userId;
    apiKey = registered.apiKey;
  });

  function accessTokenFor(role: 'user' | 'admin' = 'user'): string {
    return ctx.services.tokens.issueAccessToken({ userId, username: 'alice', role }).token;
  }

  describe('authenticate', () => {
    it('should resolve a bearer token to its principal', async () => {
      const principal = await access.authenticate({ kind: 'bearer', token: accessTokenFor() });

      expect(principal).toEqual({ userId, username: 'alice', role: 'user' });
      expect(Object.isFrozen(principal)).toBe(true);
    });

    it('should resolve an API key to its principal', async () => {
      const principal = await access.authenticate({ kind: 'apiKey', key: apiKey });

      expect(principal).toEqual({ userId, username: 'alice', role: 'user' });
    });

    it('should collapse token failures to Unauthorized and log the reason', async () => {
      await expect(access.authenticate({ kind: 'bearer', token: 'garbage' })).rejects.toThrow(
        UnauthorizedError
      );

      expect(logger.warn).toHaveBeenCalledWith(
        { credential: 'bearer', reason: 'TOKEN_MALFORMED' },
        'Authentication rejected'
      );
    });

    it('should reject a refresh token used as a bearer credential', async () => {
      const refresh = ctx.services.tokens.issueRefreshToken({
        userId,
        username: 'alice',
        role: 'user',
      }).token;

      await expect(access.authenticate({ kind: 'bearer', token: refresh })).rejects.toThrow(
        UnauthorizedError
      );
      expect(logger.warn).toHaveBeenCalledWith(
        { credential: 'bearer', reason: 'WRONG_TOKEN_TYPE' },
        'Authentication rejected'
      );
    });

    it('should reject a revoked token', async () => {
      const token = accessTokenFor();
      await ctx.services.tokens.revoke(token);

      await expect(access.authenticate({ kind: 'bearer', token })).rejects.toThrow(
        UnauthorizedError
      );
      expect(logger.warn).toHaveBeenCalledWith(
        { credential: 'bearer', reason: 'TOKEN_REVOKED' },
        'Authentication rejected'
      );
    });

    it('should cut off live tokens once the user is deactivated', async () => {
      const token = accessTokenFor();
      await access.authenticate({ kind: 'bearer', token });

      await ctx.store.setActive(userId, false);

      await expect(access.authenticate({ kind: 'bearer', token })).rejects.toThrow(
        UnauthorizedError
      );
      expect(logger.warn).toHaveBeenCalledWith(
        { credential: 'bearer', reason: 'USER_INACTIVE' },
        'Authentication rejected'
      );
    });

    it('should take the role from the stored user, not the token', async () => {
      const token = accessTokenFor('admin');
      await ctx.store.setRole(userId, 'admin');
      const before = await access.authenticate({ kind: 'bearer', token });
      expect(() => access.requireRole(before, 'admin')).not.toThrow();

      await ctx.store.setRole(userId, 'user');

      const after = await access.authenticate({ kind: 'bearer', token });
      expect(after).toEqual({ userId, username: 'alice', role: 'user' });
      expect(() => access.requireRole(after, 'admin')).toThrow(ForbiddenError);
    });

    it('should reject a token for a user that no longer exists', async () => {
      const token = ctx.services.tokens.issueAccessToken({
        userId: 'ghost',
        username: 'ghost',
        role: 'user',
      }).token;

      await expect(access.authenticate({ kind: 'bearer', token })).rejects.toThrow(
        UnauthorizedError
      );
      expect(logger.warn).toHaveBeenCalledWith(
        { credential: 'bearer', reason: 'USER_NOT_FOUND' },
        'Authentication rejected'
      );
    });

    it('should reject an unknown API key', async () => {
      await expect(access.authenticate({ kind: 'apiKey', key: 'unknown' })).rejects.toThrow(
        UnauthorizedError
      );
      expect(logger.warn).toHaveBeenCalledWith(
        { credential: 'apiKey', reason: 'INVALID_API_KEY' },
        'Authentication rejected'
      );
    });

    it('should let storage failures through unchanged', async () => {
      const failure = new StorageUnavailableError('findByApiKey');
      vi.spyOn(ctx.store, 'findByApiKey').mockRejectedValue(failure);

      await expect(access.authenticate({ kind: 'apiKey', key: apiKey })).rejects.toBe(failure);
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  describe('requireRole', () => {
    it('should pass a matching role', () => {
      expect(() =>
        access.requireRole({ userId, username: 'alice', role: 'admin' }, 'admin')
      ).not.toThrow();
    });

    it('should forbid a mismatched role', () => {
      expect(() =>
        access.requireRole({ userId, username: 'alice', role: 'user' }, 'admin')
      ).toThrow(ForbiddenError);
      expect(logger.warn).toHaveBeenCalledWith(
        { userId, role: 'user', required: 'admin' },
        'Role check failed'
      );
    });
  });
});
