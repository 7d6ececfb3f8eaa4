import type { User } from '../../domain/auth/user.js';
import {
  BackendError,
  ConstraintViolationError,
  NotFoundError,
} from '../../domain/auth/errors.js';
import { assertValidId, type AccountStore } from '../../application/accounts/accountStore.js';

function copyDate(date: Date | null): Date | null {
  return date === null ? null : new Date(date.getTime());
}

function copyUser(user: User): User {
  return { ...user, createdAt: copyDate(user.createdAt), updatedAt: copyDate(user.updatedAt) };
}

/**
 * In-process account store.
 *
 * Each operation completes synchronously before its promise resolves, so the
 * email uniqueness check and the write can't interleave with another call.
 */
export class MemoryUserRepo implements AccountStore {
  private users = new Map<number, User>();
  private idsByEmail = new Map<string, number>();
  private nextId = 1;
  private closed = false;

  async create(user: User): Promise<void> {
    this.ensureOpen();
    if (this.idsByEmail.has(user.email)) {
      throw new ConstraintViolationError(`User with email ${user.email} already exists`);
    }

    const now = new Date();
    const stored: User = {
      ...user,
      id: this.nextId++,
      password: '',
      createdAt: now,
      updatedAt: new Date(now.getTime()),
    };
    this.users.set(stored.id, stored);
    this.idsByEmail.set(stored.email, stored.id);

    user.id = stored.id;
    user.createdAt = copyDate(stored.createdAt);
    user.updatedAt = copyDate(stored.updatedAt);
  }

  async byId(id: number): Promise<User> {
    this.ensureOpen();
    assertValidId(id);
    const user = this.users.get(id);
    if (!user) {
      throw new NotFoundError(`User ${id} not found`);
    }
    return copyUser(user);
  }

  async byEmail(email: string): Promise<User> {
    this.ensureOpen();
    const id = this.idsByEmail.get(email);
    const user = id === undefined ? undefined : this.users.get(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return copyUser(user);
  }

  async update(user: User): Promise<void> {
    this.ensureOpen();
    assertValidId(user.id);
    const existing = this.users.get(user.id);
    if (!existing) {
      throw new NotFoundError(`User ${user.id} not found`);
    }

    const owner = this.idsByEmail.get(user.email);
    if (owner !== undefined && owner !== user.id) {
      throw new ConstraintViolationError(`User with email ${user.email} already exists`);
    }

    const now = new Date();
    this.users.set(user.id, {
      ...existing,
      name: user.name,
      email: user.email,
      passwordHash: user.passwordHash,
      updatedAt: now,
    });
    if (existing.email !== user.email) {
      this.idsByEmail.delete(existing.email);
      this.idsByEmail.set(user.email, user.id);
    }

    user.createdAt = copyDate(existing.createdAt);
    user.updatedAt = new Date(now.getTime());
  }

  async delete(id: number): Promise<void> {
    this.ensureOpen();
    assertValidId(id);
    const user = this.users.get(id);
    if (user) {
      this.users.delete(id);
      this.idsByEmail.delete(user.email);
    }
  }

  async close(): Promise<void> {
    this.ensureOpen();
    this.closed = true;
    this.users.clear();
    this.idsByEmail.clear();
  }

  async autoMigrate(): Promise<void> {
    this.ensureOpen();
  }

  async destructiveReset(): Promise<void> {
    this.ensureOpen();
    this.users = new Map();
    this.idsByEmail = new Map();
    this.nextId = 1;
    await this.autoMigrate();
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new BackendError('Store is closed');
    }
  }
}
