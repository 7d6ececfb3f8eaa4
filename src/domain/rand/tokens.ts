import { randomBytes as cryptoRandomBytes } from 'crypto';
import { InvalidArgumentError, RandomSourceError } from '../auth/errors.js';

/** Byte length of remember tokens (256 bits). */
export const REMEMBER_TOKEN_BYTES = 32;

export type EntropySource = (size: number) => Buffer;

const BASE64URL = /^[A-Za-z0-9_-]*$/;

export class TokenGenerator {
  constructor(private readonly source: EntropySource = cryptoRandomBytes) {}

  /**
   * Read `n` bytes from the entropy source.
   * Throws RandomSourceError rather than hand back short or missing output.
   */
  bytes(n: number): Buffer {
    if (!Number.isInteger(n) || n < 0) {
      throw new InvalidArgumentError(`Token size must be a non-negative integer, got ${n}`);
    }

    let buf: Buffer;
    try {
      buf = this.source(n);
    } catch (error) {
      throw new RandomSourceError('Failed to read random bytes', error);
    }

    if (buf.length !== n) {
      throw new RandomSourceError(`Entropy source returned ${buf.length} of ${n} bytes`);
    }
    return buf;
  }

  /**
   * URL-safe encoding of `n` random bytes: RFC 4648 base64url without `=` padding,
   * so 32 bytes give 43 characters rather than the 44 of padded base64.
   */
  token(n: number): string {
    return this.bytes(n).toString('base64url');
  }

  /**
   * Token for remember-me cookies, always REMEMBER_TOKEN_BYTES of entropy.
   * Unpadded base64url (43 characters); tokens stored from a padded encoder
   * carry a trailing `=` and won't compare equal.
   */
  rememberToken(): string {
    return this.token(REMEMBER_TOKEN_BYTES);
  }
}

const defaultGenerator = new TokenGenerator();

export function randomBytes(n: number): Buffer {
  return defaultGenerator.bytes(n);
}

export function randomToken(n: number): string {
  return defaultGenerator.token(n);
}

export function rememberToken(): string {
  return defaultGenerator.rememberToken();
}

/**
 * Number of bytes a token decodes to. Lets callers reject remember tokens
 * that weren't minted at REMEMBER_TOKEN_BYTES.
 */
export function tokenByteLength(token: string): number {
  if (!BASE64URL.test(token) || token.length % 4 === 1) {
    throw new InvalidArgumentError('Token is not base64url encoded');
  }
  return Buffer.from(token, 'base64url').length;
}
