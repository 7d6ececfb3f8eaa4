import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { Pool } from 'pg';

// Beside this module, in src/ and (copied by the build) in dist/
export const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

interface Migration {
  filename: string;
  version: number;
}

async function getMigrations(dir: string): Promise<Migration[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: Pool, dir: string, migration: Migration): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
    console.log(`✓ Applied migration ${migration.version}: ${migration.filename}`);
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply every migration in `dir` that schema_migrations hasn't recorded yet,
 * in version order, one transaction each.
 * Returns how many were applied.
 */
export async function runMigrations(pool: Pool, dir = MIGRATIONS_DIR): Promise<number> {
  await ensureMigrationsTable(pool);
  const migrations = await getMigrations(dir);
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    console.log('No pending migrations.');
    return 0;
  }

  console.log(`Found ${pending.length} pending migration(s)`);
  for (const migration of pending) {
    await applyMigration(pool, dir, migration);
  }
  return pending.length;
}

/** Drop the users table along with the migration history that created it. */
export async function dropSchema(pool: Pool): Promise<void> {
  await pool.query('DROP TABLE IF EXISTS users');
  await pool.query('DROP SEQUENCE IF EXISTS users_id_seq');
  await pool.query('DROP TABLE IF EXISTS schema_migrations');
}
