import type { MigrationClient } from './runner';

export async function up(client: MigrationClient): Promise<void> {
  await client.query(`
    CREATE TABLE enrichment_results (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      place_id TEXT NOT NULL REFERENCES businesses(place_id) ON DELETE CASCADE,
      emails JSONB NOT NULL DEFAULT '[]',
      contact_name TEXT,
      enrichment_failed BOOLEAN NOT NULL,
      enriched_at TIMESTAMPTZ NOT NULL,
      is_current BOOLEAN NOT NULL DEFAULT TRUE,
      CONSTRAINT emails_at_most_three CHECK (jsonb_array_length(emails) <= 3)
    );

    CREATE UNIQUE INDEX idx_enrichment_results_current
      ON enrichment_results(place_id) WHERE is_current = TRUE;
    CREATE INDEX idx_enrichment_results_history
      ON enrichment_results(place_id, enriched_at DESC);
  `);
}

export async function down(client: MigrationClient): Promise<void> {
  await client.query(`DROP TABLE IF EXISTS enrichment_results CASCADE;`);
}
