export type AccountErrorKind =
  | 'InvalidArgument'
  | 'NotFound'
  | 'ConstraintViolation'
  | 'InvalidCredentials'
  | 'HashingError'
  | 'RandomSourceError'
  | 'BackendError';

/**
 * Base class for every error the account layer raises.
 * `kind` is the stable classification callers switch on; the message is for humans.
 */
export class AccountError<K extends AccountErrorKind = AccountErrorKind> extends Error {
  constructor(
    public readonly kind: K,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidArgumentError extends AccountError<'InvalidArgument'> {
  constructor(message = 'Invalid argument') {
    super('InvalidArgument', message);
  }
}

export class NotFoundError extends AccountError<'NotFound'> {
  constructor(message = 'Resource not found') {
    super('NotFound', message);
  }
}

export class ConstraintViolationError extends AccountError<'ConstraintViolation'> {
  constructor(message = 'Constraint violated', cause?: unknown) {
    super('ConstraintViolation', message, { cause });
  }
}

export class InvalidCredentialsError extends AccountError<'InvalidCredentials'> {
  constructor(message = 'Incorrect password provided') {
    super('InvalidCredentials', message);
  }
}

export class HashingError extends AccountError<'HashingError'> {
  constructor(message = 'Password hashing failed', cause?: unknown) {
    super('HashingError', message, { cause });
  }
}

export class RandomSourceError extends AccountError<'RandomSourceError'> {
  constructor(message = 'Entropy source failed', cause?: unknown) {
    super('RandomSourceError', message, { cause });
  }
}

export class BackendError extends AccountError<'BackendError'> {
  constructor(message = 'Backend failure', cause?: unknown) {
    super('BackendError', message, { cause });
  }
}

export function isAccountError<K extends AccountErrorKind>(
  error: unknown,
  kind?: K
): error is AccountError<K> {
  return error instanceof AccountError && (kind === undefined || error.kind === kind);
}

const EXPECTED_KINDS: ReadonlySet<AccountErrorKind> = new Set([
  'NotFound',
  'InvalidArgument',
  'InvalidCredentials',
]);

/**
 * Errors the caller can recover from (bad input, missing record, wrong password).
 * Anything else should be reported as a server-side failure.
 */
export function isExpectedError(error: unknown): boolean {
  return isAccountError(error) && EXPECTED_KINDS.has(error.kind);
}
