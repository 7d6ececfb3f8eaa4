import dotenv from 'dotenv';
import { z } from 'zod';
import type { PasswordHashOptions } from './domain/auth/password.js';

dotenv.config();

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL environment variable is required'),
  DB_POOL_MAX: positiveInt.default(20),
  ARGON2_MEMORY_COST: positiveInt.optional(),
  ARGON2_TIME_COST: positiveInt.optional(),
  ARGON2_PARALLELISM: positiveInt.optional(),
});

export type Environment = z.infer<typeof envSchema>['NODE_ENV'];

export interface AppConfig {
  env: Environment;
  isProd: boolean;
  database: {
    /** Handed to the driver untouched. */
    connectionString: string;
    max: number;
  };
  passwordHashing: PasswordHashOptions;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse({
    ...env,
    // unset and empty both report the "is required" message
    DATABASE_URL: env.DATABASE_URL ?? '',
  });

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const parsed = result.data;
  return {
    env: parsed.NODE_ENV,
    isProd: parsed.NODE_ENV === 'production',
    database: {
      connectionString: parsed.DATABASE_URL,
      max: parsed.DB_POOL_MAX,
    },
    passwordHashing: {
      memoryCost: parsed.ARGON2_MEMORY_COST,
      timeCost: parsed.ARGON2_TIME_COST,
      parallelism: parsed.ARGON2_PARALLELISM,
    },
  };
}
