import type { MigrationClient } from './runner';

export async function up(client: MigrationClient): Promise<void> {
  await client.query(`
    CREATE TABLE enrichment_cache (
      cache_key TEXT PRIMARY KEY,
      payload TEXT NOT NULL,
      expires_at TIMESTAMPTZ NOT NULL
    );

    CREATE INDEX idx_enrichment_cache_expires ON enrichment_cache(expires_at);
  `);
}

export async function down(client: MigrationClient): Promise<void> {
  await client.query(`DROP TABLE IF EXISTS enrichment_cache;`);
}
