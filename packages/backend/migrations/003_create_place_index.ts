import type { MigrationClient } from './runner';

// One row per place id ever admitted; the owning job is the first to see it.
export async function up(client: MigrationClient): Promise<void> {
  await client.query(`
    CREATE TABLE place_index (
      place_id TEXT PRIMARY KEY,
      job_id TEXT NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
      processed BOOLEAN NOT NULL DEFAULT FALSE,
      admitted_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      processed_at TIMESTAMPTZ
    );

    CREATE INDEX idx_place_index_job ON place_index(job_id, admitted_at);
    CREATE INDEX idx_place_index_pending ON place_index(job_id) WHERE processed = FALSE;
  `);
}

export async function down(client: MigrationClient): Promise<void> {
  await client.query(`DROP TABLE IF EXISTS place_index CASCADE;`);
}
