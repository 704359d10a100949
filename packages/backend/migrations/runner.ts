import { Client } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { describeError, logger } from '../src/shared/logger';

/** The part of a pg client that migrations use. */
export interface MigrationClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface Migration {
  name: string;
  up(client: MigrationClient): Promise<void>;
  down(client: MigrationClient): Promise<void>;
}

const MIGRATION_FILE_PATTERN = /^\d{3}_.*\.ts$/;

const executedRowsSchema = z.array(z.object({ name: z.string() }));

export function getMigrationFiles(dir: string): string[] {
  return fs
    .readdirSync(dir)
    .filter((f) => MIGRATION_FILE_PATTERN.test(f))
    .sort();
}

function isMigrationModule(value: unknown): value is Pick<Migration, 'up' | 'down'> {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'up' in value && typeof value.up === 'function' && 'down' in value && typeof value.down === 'function'
  );
}

async function loadMigration(dir: string, file: string): Promise<Migration> {
  const mod: unknown = await import(path.join(dir, file));
  if (!isMigrationModule(mod)) {
    throw new Error(`Migration ${file} must export up() and down()`);
  }
  return { name: file, up: mod.up, down: mod.down };
}

async function ensureMigrationsTable(client: MigrationClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getExecutedMigrations(client: MigrationClient): Promise<string[]> {
  const result = await client.query('SELECT name FROM _migrations ORDER BY name');
  return executedRowsSchema.parse(result.rows).map((r) => r.name);
}

/**
 * Applies every migration not yet recorded, in name order, each in its own
 * transaction. Returns the names applied.
 */
export async function runUp(client: MigrationClient, migrations: Migration[]): Promise<string[]> {
  await ensureMigrationsTable(client);
  const executed = new Set(await getExecutedMigrations(client));
  const pending = migrations
    .filter((m) => !executed.has(m.name))
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const migration of pending) {
    await client.query('BEGIN');
    try {
      await migration.up(client);
      await client.query('INSERT INTO _migrations (name) VALUES ($1)', [migration.name]);
      await client.query('COMMIT');
      logger.info('Migration applied', { migration: migration.name });
    } catch (err) {
      await client.query('ROLLBACK');
      logger.error('Migration failed', { migration: migration.name, error: describeError(err) });
      throw err;
    }
  }
  return pending.map((m) => m.name);
}

/** Rolls back the most recent migration. Returns its name, or null if none ran. */
export async function runDown(client: MigrationClient, migrations: Migration[]): Promise<string | null> {
  await ensureMigrationsTable(client);
  const executed = await getExecutedMigrations(client);
  if (executed.length === 0) return null;

  const lastName = executed[executed.length - 1];
  const migration = migrations.find((m) => m.name === lastName);
  if (!migration) {
    throw new Error(`Migration file not found: ${lastName}`);
  }

  await client.query('BEGIN');
  try {
    await migration.down(client);
    await client.query('DELETE FROM _migrations WHERE name = $1', [lastName]);
    await client.query('COMMIT');
    logger.info('Migration rolled back', { migration: lastName });
  } catch (err) {
    await client.query('ROLLBACK');
    logger.error('Rollback failed', { migration: lastName, error: describeError(err) });
    throw err;
  }
  return lastName;
}

async function main(): Promise<void> {
  // Loaded here so importing this module from tests needs no environment
  const { env } = await import('../src/config/env');
  const direction = process.argv[2] === 'down' ? 'down' : 'up';
  const client = new Client({ connectionString: env.DATABASE_URL });
  const migrationClient: MigrationClient = {
    query: (text, values) => client.query(text, values),
  };

  try {
    await client.connect();
    const migrations = await Promise.all(getMigrationFiles(__dirname).map((f) => loadMigration(__dirname, f)));

    if (direction === 'down') {
      const rolledBack = await runDown(migrationClient, migrations);
      logger.info(rolledBack ? 'Rollback complete' : 'No migrations to roll back');
    } else {
      const applied = await runUp(migrationClient, migrations);
      logger.info(applied.length > 0 ? 'Migrations complete' : 'No pending migrations', { applied: applied.length });
    }
  } catch (err) {
    logger.error('Migration run failed', { error: describeError(err) });
    process.exitCode = 1;
  } finally {
    await client.end();
  }
}

if (require.main === module) {
  void main();
}
