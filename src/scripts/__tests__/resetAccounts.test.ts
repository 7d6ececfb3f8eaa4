import { describe, it, expect, vi } from 'vitest';
import { resetAccounts } from '../resetAccounts.js';
import { MemoryUserRepo } from '../../infra/memory/memoryUserRepo.js';
import { newUser } from '../../domain/auth/user.js';
import { NotFoundError } from '../../domain/auth/errors.js';

describe('resetAccounts', () => {
  it('should refuse to run in production', async () => {
    const destructiveReset = vi.fn().mockResolvedValue(undefined);

    await expect(
      resetAccounts({ destructiveReset }, { env: 'production', isProd: true })
    ).rejects.toThrow('Refusing to reset accounts in production');
    expect(destructiveReset).not.toHaveBeenCalled();
  });

  it('should wipe every account outside production', async () => {
    const store = new MemoryUserRepo();
    await store.create({ ...newUser({ email: 'old@example.com', password: '' }), passwordHash: 'h' });

    await resetAccounts(store, { env: 'test', isProd: false });

    await expect(store.byEmail('old@example.com')).rejects.toBeInstanceOf(NotFoundError);
  });
});
