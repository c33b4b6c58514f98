import { describe, it, expect, beforeEach } from 'vitest';
import {
  InvalidCredentialsError,
  UserNotFoundError,
  WeakPasswordError,
} from '../../../domain/auth/errors.js';
import { createTestContext, STRONG_PASSWORD, type TestContext } from '../../../__tests__/helpers.js';

describe('ChangePasswordUseCase', () => {
  const NEW_PASSWORD = 'Newpass9#';
  let ctx: TestContext;
  let userId: string;

  beforeEach(async () => {
    ctx = createTestContext();
    const registered = await ctx.services.register.execute({
      username: 'alice',
      email: 'alice@example.com',
      password: STRONG_PASSWORD,
    });
    userId = registered.userId;
  });

  it('should replace the password', async () => {
    await ctx.services.changePassword.execute({
      userId,
      currentPassword: STRONG_PASSWORD,
      newPassword: NEW_PASSWORD,
    });

    await expect(
      ctx.services.login.execute({ identifier: 'alice', password: NEW_PASSWORD })
    ).resolves.toMatchObject({ tokenType: 'bearer' });
    await expect(
      ctx.services.login.execute({ identifier: 'alice', password: STRONG_PASSWORD })
    ).rejects.toBeInstanceOf(InvalidCredentialsError);
  });

  it('should reject a wrong current password', async () => {
    await expect(
      ctx.services.changePassword.execute({
        userId,
        currentPassword: 'Wrong123!',
        newPassword: NEW_PASSWORD,
      })
    ).rejects.toThrow('Current password is incorrect');
  });

  it('should apply the password policy to the new password', async () => {
    const before = await ctx.store.findById(userId);

    await expect(
      ctx.services.changePassword.execute({
        userId,
        currentPassword: STRONG_PASSWORD,
        newPassword: 'short1!',
      })
    ).rejects.toMatchObject({ rule: 'length' });

    const after = await ctx.store.findById(userId);
    expect(after?.passwordHash).toBe(before?.passwordHash);
  });

  it('should fail for an unknown user', async () => {
    await expect(
      ctx.services.changePassword.execute({
        userId: 'no-such-user',
        currentPassword: STRONG_PASSWORD,
        newPassword: NEW_PASSWORD,
      })
    ).rejects.toBeInstanceOf(UserNotFoundError);
  });

  it('should throw the policy error type', async () => {
    await expect(
      ctx.services.changePassword.execute({
        userId,
        currentPassword: STRONG_PASSWORD,
        newPassword: 'nouppercase1!',
      })
    ).rejects.toBeInstanceOf(WeakPasswordError);
  });
});
