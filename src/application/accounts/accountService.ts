import { z } from 'zod';
import type { User } from '../../domain/auth/user.js';
import { Argon2Password, type PasswordHasher } from '../../domain/auth/password.js';
import {
  BackendError,
  HashingError,
  InvalidArgumentError,
  InvalidCredentialsError,
  isAccountError,
} from '../../domain/auth/errors.js';
import type { AccountStore } from './accountStore.js';

const createUserSchema = z.object({
  name: z.string(),
  email: z.string().min(1, 'email is required'),
  password: z.string().min(1, 'password is required'),
});

const updateUserSchema = z.object({
  name: z.string(),
  email: z.string().min(1, 'email is required'),
});

function parseOrThrow(schema: z.ZodTypeAny, user: User): void {
  const result = schema.safeParse(user);
  if (!result.success) {
    throw new InvalidArgumentError(
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')
    );
  }
}

/**
 * Account operations for request handlers.
 *
 * Owns password handling: plaintext goes in, only the hash reaches the store.
 * Everything else forwards to the store, whose errors come back unchanged.
 */
export class AccountService implements AccountStore {
  constructor(
    private readonly store: AccountStore,
    private readonly hasher: PasswordHasher = new Argon2Password()
  ) {}

  /**
   * Hash the password, clear the plaintext, then insert.
   * Backfills `id`, `createdAt` and `updatedAt` on the given user.
   */
  async create(user: User): Promise<void> {
    parseOrThrow(createUserSchema, user);
    await this.applyPassword(user);
    await this.store.create(user);
  }

  byId(id: number): Promise<User> {
    return this.store.byId(id);
  }

  byEmail(email: string): Promise<User> {
    return this.store.byEmail(email);
  }

  /**
   * Save every mutable field. A non-empty `password` replaces the stored hash;
   * an empty one leaves it as is.
   */
  async update(user: User): Promise<void> {
    parseOrThrow(updateUserSchema, user);
    if (user.password !== '') {
      await this.applyPassword(user);
    }
    await this.store.update(user);
  }

  delete(id: number): Promise<void> {
    return this.store.delete(id);
  }

  close(): Promise<void> {
    return this.store.close();
  }

  autoMigrate(): Promise<void> {
    return this.store.autoMigrate();
  }

  destructiveReset(): Promise<void> {
    return this.store.destructiveReset();
  }

  /**
   * Check an email/password pair.
   *
   * An unknown email rejects with whatever `byEmail` raised (NotFound), a wrong
   * password with InvalidCredentials. Callers that must not reveal which
   * emails exist should treat both the same way.
   */
  async authenticate(email: string, password: string): Promise<User> {
    const user = await this.store.byEmail(email);

    let matches: boolean;
    try {
      matches = await this.hasher.verify(password, user.passwordHash);
    } catch (error) {
      throw new BackendError('Failed to verify password', error);
    }

    if (!matches) {
      throw new InvalidCredentialsError();
    }
    return user;
  }

  private async applyPassword(user: User): Promise<void> {
    try {
      user.passwordHash = await this.hasher.hash(user.password);
    } catch (error) {
      throw isAccountError(error) ? error : new HashingError('Failed to hash password', error);
    }
    user.password = '';
  }
}
