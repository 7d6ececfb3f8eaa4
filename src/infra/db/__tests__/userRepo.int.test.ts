import { describe, afterAll } from 'vitest';
import { createPool } from '../pool.js';
import { UserRepo } from '../userRepo.js';
import { describeAccountStoreContract } from '../../../application/accounts/__tests__/accountStoreContract.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

// Each test resets the users table: point DATABASE_URL at a throwaway database.
describeDb('UserRepo against PostgreSQL', () => {
  const pool = createPool(process.env.DATABASE_URL ?? '', { max: 2 });

  afterAll(async () => {
    await pool.end();
  });

  describeAccountStoreContract('UserRepo (PostgreSQL)', async () => {
    const repo = new UserRepo(pool);
    await repo.destructiveReset();
    return repo;
  });
});
