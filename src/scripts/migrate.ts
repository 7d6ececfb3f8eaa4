import { loadConfig } from '../config.js';
import { createAccountService } from '../infra/services.js';

export async function migrate(): Promise<void> {
  const accounts = createAccountService(loadConfig());

  try {
    console.log('Starting migrations...');
    await accounts.autoMigrate();
    console.log('All migrations applied successfully.');
  } finally {
    await accounts.close();
  }
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('migrate.ts')) {
  migrate()
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      console.error('Migration failed:', error);
      process.exit(1);
    });
}
