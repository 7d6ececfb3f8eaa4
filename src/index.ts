export type { User, NewUserInput } from './domain/auth/user.js';
export { newUser } from './domain/auth/user.js';
export {
  AccountError,
  BackendError,
  ConstraintViolationError,
  HashingError,
  InvalidArgumentError,
  InvalidCredentialsError,
  NotFoundError,
  RandomSourceError,
  isAccountError,
  isExpectedError,
} from './domain/auth/errors.js';
export type { AccountErrorKind } from './domain/auth/errors.js';
export { Argon2Password } from './domain/auth/password.js';
export type { PasswordHasher, PasswordHashOptions } from './domain/auth/password.js';
export {
  REMEMBER_TOKEN_BYTES,
  TokenGenerator,
  randomBytes,
  randomToken,
  rememberToken,
  tokenByteLength,
} from './domain/rand/tokens.js';
export type { EntropySource } from './domain/rand/tokens.js';
export { assertValidId } from './application/accounts/accountStore.js';
export type { AccountStore } from './application/accounts/accountStore.js';
export { AccountService } from './application/accounts/accountService.js';
export { UserRepo } from './infra/db/userRepo.js';
export { MemoryUserRepo } from './infra/memory/memoryUserRepo.js';
export { createPool } from './infra/db/pool.js';
export { createAccountService } from './infra/services.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
