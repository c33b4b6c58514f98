import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().min(0).default(24 * 60 * 60),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce.number().int().min(0).default(30 * 24 * 60 * 60),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  STORAGE_READ_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  STORAGE_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(50),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
  REVOCATION_PRUNE_INTERVAL_MS: z.coerce.number().int().min(0).default(60 * 60 * 1000),
  ARGON2_TIME_COST: z.coerce.number().int().min(2).default(3),
  ARGON2_MEMORY_COST_KIB: z.coerce.number().int().min(1024).default(65536),
});

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  logLevel: string;
  jwt: {
    secret: string;
    accessTokenTtlSeconds: number;
    refreshTokenTtlSeconds: number;
  };
  storage: {
    timeoutMs: number;
    readRetries: number;
    retryBaseDelayMs: number;
  };
  rateLimit: {
    windowMs: number;
    max: number;
    loginMax: number;
  };
  revocationPruneIntervalMs: number;
  argon2: {
    timeCost: number;
    memoryCost: number;
  };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    databaseUrl: data.DATABASE_URL,
    logLevel: data.LOG_LEVEL,
    jwt: {
      secret: data.JWT_SECRET,
      accessTokenTtlSeconds: data.ACCESS_TOKEN_TTL_SECONDS,
      refreshTokenTtlSeconds: data.REFRESH_TOKEN_TTL_SECONDS,
    },
    storage: {
      timeoutMs: data.STORAGE_TIMEOUT_MS,
      readRetries: data.STORAGE_READ_RETRIES,
      retryBaseDelayMs: data.STORAGE_RETRY_BASE_DELAY_MS,
    },
    rateLimit: {
      windowMs: data.RATE_LIMIT_WINDOW_MS,
      max: data.RATE_LIMIT_MAX,
      loginMax: data.LOGIN_RATE_LIMIT_MAX,
    },
    revocationPruneIntervalMs: data.REVOCATION_PRUNE_INTERVAL_MS,
    argon2: {
      timeCost: data.ARGON2_TIME_COST,
      memoryCost: data.ARGON2_MEMORY_COST_KIB,
    },
  };
}
