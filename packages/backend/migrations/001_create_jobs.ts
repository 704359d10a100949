import type { MigrationClient } from './runner';

export async function up(client: MigrationClient): Promise<void> {
  await client.query(`
    CREATE TYPE job_status AS ENUM ('queued', 'running', 'completed', 'failed', 'cancelled');
    CREATE TYPE job_kind AS ENUM ('single', 'batch');

    CREATE TABLE jobs (
      id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::text,
      kind job_kind NOT NULL,
      batch_id UUID,
      query TEXT NOT NULL,
      location TEXT,
      max_results INTEGER NOT NULL CHECK (max_results > 0),
      status job_status NOT NULL DEFAULT 'queued',
      total_records INTEGER NOT NULL DEFAULT 0,
      processed_records INTEGER NOT NULL DEFAULT 0,
      enriched_records INTEGER NOT NULL DEFAULT 0,
      failed_records INTEGER NOT NULL DEFAULT 0,
      error_message TEXT,
      last_checkpoint JSONB,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX idx_jobs_batch ON jobs(batch_id, created_at) WHERE batch_id IS NOT NULL;
  `);
}

export async function down(client: MigrationClient): Promise<void> {
  await client.query(`
    DROP TABLE IF EXISTS jobs CASCADE;
    DROP TYPE IF EXISTS job_kind;
    DROP TYPE IF EXISTS job_status;
  `);
}
