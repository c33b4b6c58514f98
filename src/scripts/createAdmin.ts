import 'dotenv/config';
import { fileURLToPath } from 'url';
import { createPool } from '../infra/db/pool.js';
import { PgAuthStore } from '../infra/db/pgAuthStore.js';
import { Password, type CredentialHasher } from '../domain/auth/password.js';
import { RegisterUseCase, type RegisterResult } from '../application/auth/register.js';
import type { UserStore } from '../application/auth/ports.js';

export interface CreateAdminArgs {
  username: string;
  email: string;
  password: string;
}

export function parseArgs(argv: string[]): CreateAdminArgs {
  const [username, email, password] = argv;
  if (!username || !email || !password) {
    throw new Error('Usage: create-admin <username> <email> <password>');
  }
  return { username, email, password };
}

/**
 * Create an administrator account. The usual registration rules apply
 * (password policy, unique username and email).
 */
export async function createAdmin(
  store: UserStore,
  args: CreateAdminArgs,
  hasher: CredentialHasher = new Password()
): Promise<RegisterResult> {
  const register = new RegisterUseCase(store, hasher);
  return await register.execute({ ...args, role: 'admin' });
}

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const args = parseArgs(process.argv.slice(2));
  const pool = createPool({ connectionString, queryTimeoutMs: 10000 });
  try {
    const result = await createAdmin(new PgAuthStore(pool), args);
    console.log(`✓ Admin "${result.username}" created (id ${result.userId})`);
    console.log(`  API key: ${result.apiKey}`);
  } finally {
    await pool.end();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('Failed to create admin:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
