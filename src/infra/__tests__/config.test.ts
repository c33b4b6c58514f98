import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  const base = { JWT_SECRET: 'test-secret-0123456789' };

  it('should apply defaults', () => {
    const config = loadConfig(base);

    expect(config).toEqual({
      port: 3000,
      databaseUrl: undefined,
      logLevel: 'info',
      jwt: {
        secret: 'test-secret-0123456789',
        accessTokenTtlSeconds: 86400,
        refreshTokenTtlSeconds: 2592000,
      },
      storage: { timeoutMs: 2000, readRetries: 2, retryBaseDelayMs: 50 },
      rateLimit: { windowMs: 60000, max: 60, loginMax: 10 },
      revocationPruneIntervalMs: 3600000,
      argon2: { timeCost: 3, memoryCost: 65536 },
    });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({
      ...base,
      PORT: '8080',
      ACCESS_TOKEN_TTL_SECONDS: '900',
      STORAGE_READ_RETRIES: '0',
      DATABASE_URL: 'postgres://localhost:5432/auth',
    });

    expect(config.port).toBe(8080);
    expect(config.jwt.accessTokenTtlSeconds).toBe(900);
    expect(config.storage.readRetries).toBe(0);
    expect(config.databaseUrl).toBe('postgres://localhost:5432/auth');
  });

  it('should require a signing secret', () => {
    expect(() => loadConfig({})).toThrow('Invalid environment: JWT_SECRET: Required');
  });

  it('should reject a short signing secret', () => {
    expect(() => loadConfig({ JWT_SECRET: 'short' })).toThrow(
      'Invalid environment: JWT_SECRET: JWT_SECRET must be at least 16 characters'
    );
  });

  it('should reject an invalid number', () => {
    expect(() => loadConfig({ ...base, PORT: 'abc' })).toThrow(/^Invalid environment: PORT: /);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ ...base, LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
