import { describe, it, expect } from 'vitest';
import { MemoryUserRepo } from '../memoryUserRepo.js';
import { newUser } from '../../../domain/auth/user.js';
import { BackendError } from '../../../domain/auth/errors.js';
import { describeAccountStoreContract } from '../../../application/accounts/__tests__/accountStoreContract.js';

describeAccountStoreContract('MemoryUserRepo', async () => new MemoryUserRepo());

describe('MemoryUserRepo', () => {
  it('should hand out copies that do not alias stored state', async () => {
    const repo = new MemoryUserRepo();
    const user = { ...newUser({ email: 'copy@example.com', password: '' }), passwordHash: 'h' };
    await repo.create(user);

    const fetched = await repo.byId(user.id);
    fetched.name = 'Mutated';
    user.name = 'Also mutated';

    await expect(repo.byId(user.id)).resolves.toMatchObject({ name: '' });
  });

  it('should not let callers rewrite stored timestamps', async () => {
    const repo = new MemoryUserRepo();
    const user = { ...newUser({ email: 'dates@example.com', password: '' }), passwordHash: 'h' };
    await repo.create(user);
    const createdAt = user.createdAt?.getTime();

    user.createdAt?.setFullYear(1970);
    const fetched = await repo.byId(user.id);
    fetched.updatedAt?.setFullYear(1971);
    fetched.createdAt?.setFullYear(1972);

    const reloaded = await repo.byId(user.id);
    expect(reloaded.createdAt?.getTime()).toBe(createdAt);
    expect(reloaded.updatedAt?.getTime()).toBe(createdAt);
  });

  it('should never store a plaintext password', async () => {
    const repo = new MemoryUserRepo();
    const user = { ...newUser({ email: 'plain@example.com', password: 'leaked' }), passwordHash: 'h' };
    await repo.create(user);

    await expect(repo.byId(user.id)).resolves.toMatchObject({ password: '' });
  });

  it('should restart ids after a destructive reset', async () => {
    const repo = new MemoryUserRepo();
    const first = { ...newUser({ email: 'a@example.com', password: '' }), passwordHash: 'h' };
    await repo.create(first);
    await repo.destructiveReset();

    const again = { ...newUser({ email: 'b@example.com', password: '' }), passwordHash: 'h' };
    await repo.create(again);

    expect(first.id).toBe(1);
    expect(again.id).toBe(1);
  });

  it('should fail every operation once closed', async () => {
    const repo = new MemoryUserRepo();
    await repo.close();

    await expect(repo.byId(1)).rejects.toBeInstanceOf(BackendError);
    await expect(repo.byEmail('x@example.com')).rejects.toBeInstanceOf(BackendError);
    await expect(repo.autoMigrate()).rejects.toBeInstanceOf(BackendError);
    await expect(repo.close()).rejects.toThrow('Store is closed');
  });
});
