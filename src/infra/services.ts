import type { Pool } from 'pg';
import type { AppConfig } from '../config.js';
import { AccountService } from '../application/accounts/accountService.js';
import { Argon2Password } from '../domain/auth/password.js';
import { createPool } from './db/pool.js';
import { UserRepo } from './db/userRepo.js';

/**
 * Composition root: PostgreSQL store plus Argon2 hashing behind an AccountService.
 * Pass `pool` to reuse an existing one; otherwise it's built from the config.
 */
export function createAccountService(config: AppConfig, pool?: Pool): AccountService {
  const db =
    pool ?? createPool(config.database.connectionString, { max: config.database.max });
  return new AccountService(new UserRepo(db), new Argon2Password(config.passwordHashing));
}
