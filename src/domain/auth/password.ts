import { argon2id, hash, verify } from 'argon2';

export interface PasswordHashOptions {
  memoryCost?: number;
  timeCost?: number;
  parallelism?: number;
}

/**
 * Slow, salted password hashing.
 * `verify` resolves false on a mismatch and rejects when the stored hash can't be checked at all.
 */
export interface PasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, passwordHash: string): Promise<boolean>;
}

/**
 * Argon2id hasher. Hashes are PHC strings carrying their own salt and cost,
 * so changing the options later doesn't invalidate existing hashes.
 */
export class Argon2Password implements PasswordHasher {
  private readonly options: PasswordHashOptions = {};

  constructor(options: PasswordHashOptions = {}) {
    // argon2 spreads options over its defaults, so an undefined key would erase the default
    if (options.memoryCost !== undefined) this.options.memoryCost = options.memoryCost;
    if (options.timeCost !== undefined) this.options.timeCost = options.timeCost;
    if (options.parallelism !== undefined) this.options.parallelism = options.parallelism;
  }

  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, { ...this.options, type: argon2id });
  }

  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    return await verify(passwordHash, plainPassword);
  }
}
