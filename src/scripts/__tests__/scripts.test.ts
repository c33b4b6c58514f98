import { describe, it, expect } from 'vitest';
import { createAdmin, parseArgs } from '../createAdmin.js';
import { pruneRevokedTokens } from '../pruneRevokedTokens.js';
import { InMemoryAuthStore } from '../../infra/db/memoryAuthStore.js';
import { WeakPasswordError } from '../../domain/auth/errors.js';
import { fastHasher, FakeClock, STRONG_PASSWORD } from '../../__tests__/helpers.js';

describe('create-admin', () => {
  it('should parse positional arguments', () => {
    expect(parseArgs(['root', 'root@example.com', STRONG_PASSWORD])).toEqual({
      username: 'root',
      email: 'root@example.com',
      password: STRONG_PASSWORD,
    });
  });

  it('should print usage when arguments are missing', () => {
    expect(() => parseArgs(['root'])).toThrow('Usage: create-admin <username> <email> <password>');
  });

  it('should create an admin through the normal registration rules', async () => {
    const store = new InMemoryAuthStore(new FakeClock());

    const result = await createAdmin(
      store,
      { username: 'root', email: 'root@example.com', password: STRONG_PASSWORD },
      fastHasher
    );

    await expect(store.findById(result.userId)).resolves.toMatchObject({
      username: 'root',
      role: 'admin',
    });
    await expect(
      createAdmin(
        store,
        { username: 'root2', email: 'root2@example.com', password: 'weak' },
        fastHasher
      )
    ).rejects.toBeInstanceOf(WeakPasswordError);
  });
});

describe('prune-revoked', () => {
  it('should remove revocations that outlived their token', async () => {
    const store = new InMemoryAuthStore(new FakeClock());
    await store.revoke({
      tokenId: 'jti-1',
      userId: 'u1',
      expiresAt: new Date('2025-03-10T12:00:00.000Z'),
    });

    await expect(pruneRevokedTokens(store, new Date('2025-03-10T11:00:00.000Z'))).resolves.toBe(0);
    await expect(pruneRevokedTokens(store, new Date('2025-03-10T12:00:00.000Z'))).resolves.toBe(1);
  });
});
