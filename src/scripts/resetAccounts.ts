import type { AccountStore } from '../application/accounts/accountStore.js';
import { loadConfig, type AppConfig } from '../config.js';
import { createAccountService } from '../infra/services.js';

/**
 * Drop and rebuild the user storage. Refuses to touch a production database.
 */
export async function resetAccounts(
  store: Pick<AccountStore, 'destructiveReset'>,
  config: Pick<AppConfig, 'env' | 'isProd'>
): Promise<void> {
  if (config.isProd) {
    throw new Error('Refusing to reset accounts in production');
  }

  console.warn('⚠️  WARNING: This will delete every user account.');
  console.log(`Resetting accounts (${config.env})...`);
  await store.destructiveReset();
  console.log('✓ Accounts reset');
}

// Run if called directly
if (
  import.meta.url === `file://${process.argv[1]}` ||
  process.argv[1]?.endsWith('resetAccounts.ts')
) {
  const config = loadConfig();
  const accounts = createAccountService(config);
  resetAccounts(accounts, config)
    .finally(() => accounts.close())
    .then(() => {
      console.log('Done.');
      process.exit(0);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
