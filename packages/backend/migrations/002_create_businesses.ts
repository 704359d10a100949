import type { MigrationClient } from './runner';

export async function up(client: MigrationClient): Promise<void> {
  await client.query(`
    CREATE TABLE businesses (
      place_id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      address TEXT,
      phone TEXT,
      website TEXT,
      latitude NUMERIC(9, 6),
      longitude NUMERIC(9, 6),
      rating NUMERIC(2, 1),
      review_count INTEGER,
      categories TEXT[] NOT NULL DEFAULT '{}',
      hours JSONB NOT NULL DEFAULT '{}',
      source_search TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

export async function down(client: MigrationClient): Promise<void> {
  await client.query(`DROP TABLE IF EXISTS businesses CASCADE;`);
}
