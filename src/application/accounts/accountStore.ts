import type { User } from '../../domain/auth/user.js';
import { InvalidArgumentError } from '../../domain/auth/errors.js';

/**
 * Persistence contract for user accounts.
 *
 * Implementations classify their failures into the AccountError taxonomy at
 * this boundary: duplicate email is ConstraintViolation, a missing record is
 * NotFound, anything else the backend reports is BackendError.
 * Implementations must be safe to call concurrently.
 */
export interface AccountStore {
  /** Insert the user and backfill `id`, `createdAt` and `updatedAt` on it. */
  create(user: User): Promise<void>;
  byId(id: number): Promise<User>;
  byEmail(email: string): Promise<User>;
  /** Persist name, email and password hash keyed by `user.id`; backfills `updatedAt`. */
  update(user: User): Promise<void>;
  /** Remove the user. Deleting an id that doesn't exist is not an error. */
  delete(id: number): Promise<void>;
  close(): Promise<void>;
  autoMigrate(): Promise<void>;
  /** Drop the user storage and rebuild it. Never run against live data. */
  destructiveReset(): Promise<void>;
}

export function assertValidId(id: number): void {
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidArgumentError(`ID provided was invalid: ${id}`);
  }
}
