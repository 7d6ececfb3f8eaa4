import type { Pool } from 'pg';
import type { User } from '../../domain/auth/user.js';
import {
  AccountError,
  BackendError,
  ConstraintViolationError,
  NotFoundError,
  isAccountError,
} from '../../domain/auth/errors.js';
import { assertValidId, type AccountStore } from '../../application/accounts/accountStore.js';
import { dropSchema, MIGRATIONS_DIR, runMigrations } from './migrate.js';

interface UserRow {
  id: number;
  name: string;
  email: string;
  password_hash: string;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = 'id, name, email, password_hash, created_at, updated_at';

// SQLSTATE unique_violation
const UNIQUE_VIOLATION = '23505';

// users.id is a SERIAL (int4); larger ids can't exist and the server rejects them as parameters
const MAX_USER_ID = 2147483647;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    password: '',
    passwordHash: row.password_hash,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return error.code === UNIQUE_VIOLATION;
  }
  return (
    error instanceof Error &&
    error.message.includes('duplicate key value violates unique constraint')
  );
}

function classify(error: unknown): AccountError {
  if (isAccountError(error)) {
    return error;
  }
  if (isUniqueViolation(error)) {
    return new ConstraintViolationError('User with this email already exists', error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendError(`Database operation failed: ${message}`, error);
}

export interface UserRepoOptions {
  migrationsDir?: string;
}

/**
 * PostgreSQL account store. Every failure leaves here already classified.
 */
export class UserRepo implements AccountStore {
  private readonly migrationsDir: string;

  constructor(
    private readonly pool: Pool,
    options: UserRepoOptions = {}
  ) {
    this.migrationsDir = options.migrationsDir ?? MIGRATIONS_DIR;
  }

  async create(user: User): Promise<void> {
    const row = await this.run(async () => {
      const result = await this.pool.query<Pick<UserRow, 'id' | 'created_at' | 'updated_at'>>(
        `INSERT INTO users (name, email, password_hash)
         VALUES ($1, $2, $3)
         RETURNING id, created_at, updated_at`,
        [user.name, user.email, user.passwordHash]
      );
      return result.rows[0];
    });

    user.id = row.id;
    user.createdAt = row.created_at;
    user.updatedAt = row.updated_at;
  }

  async byId(id: number): Promise<User> {
    assertValidId(id);
    if (id > MAX_USER_ID) {
      throw new NotFoundError(`User ${id} not found`);
    }
    return this.findOne('id = $1', id, `User ${id} not found`);
  }

  async byEmail(email: string): Promise<User> {
    return this.findOne('email = $1', email, 'User not found');
  }

  async update(user: User): Promise<void> {
    assertValidId(user.id);
    if (user.id > MAX_USER_ID) {
      throw new NotFoundError(`User ${user.id} not found`);
    }
    const row = await this.run(async () => {
      const result = await this.pool.query<Pick<UserRow, 'created_at' | 'updated_at'>>(
        `UPDATE users
         SET name = $1, email = $2, password_hash = $3, updated_at = NOW()
         WHERE id = $4
         RETURNING created_at, updated_at`,
        [user.name, user.email, user.passwordHash, user.id]
      );
      return result.rows[0];
    });

    if (!row) {
      throw new NotFoundError(`User ${user.id} not found`);
    }
    user.createdAt = row.created_at;
    user.updatedAt = row.updated_at;
  }

  async delete(id: number): Promise<void> {
    assertValidId(id);
    if (id > MAX_USER_ID) {
      return;
    }
    await this.run(() => this.pool.query('DELETE FROM users WHERE id = $1', [id]));
  }

  async close(): Promise<void> {
    await this.run(() => this.pool.end());
  }

  async autoMigrate(): Promise<void> {
    await this.run(() => runMigrations(this.pool, this.migrationsDir));
  }

  async destructiveReset(): Promise<void> {
    await this.run(() => dropSchema(this.pool));
    await this.autoMigrate();
  }

  private async findOne(where: string, value: unknown, notFound: string): Promise<User> {
    const row = await this.run(async () => {
      const result = await this.pool.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE ${where}`,
        [value]
      );
      return result.rows[0];
    });

    if (!row) {
      throw new NotFoundError(notFound);
    }
    return toUser(row);
  }

  private async run<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw classify(error);
    }
  }
}
