import type { MigrationClient } from './runner';

export async function up(client: MigrationClient): Promise<void> {
  await client.query(`
    CREATE TABLE cost_events (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      provider TEXT NOT NULL,
      endpoint TEXT NOT NULL,
      cost NUMERIC(12, 6) NOT NULL CHECK (cost >= 0),
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      success BOOLEAN NOT NULL,
      error_message TEXT
    );

    CREATE INDEX idx_cost_events_created ON cost_events(created_at);
    CREATE INDEX idx_cost_events_provider_created ON cost_events(provider, created_at);

    -- The ledger is append-only
    CREATE OR REPLACE FUNCTION prevent_cost_event_mutation()
    RETURNS TRIGGER AS $$
    BEGIN
      RAISE EXCEPTION 'cost_events is append-only';
    END;
    $$ LANGUAGE plpgsql;

    CREATE TRIGGER trg_cost_events_immutable
      BEFORE UPDATE OR DELETE ON cost_events
      FOR EACH ROW EXECUTE FUNCTION prevent_cost_event_mutation();
  `);
}

export async function down(client: MigrationClient): Promise<void> {
  await client.query(`
    DROP TRIGGER IF EXISTS trg_cost_events_immutable ON cost_events;
    DROP FUNCTION IF EXISTS prevent_cost_event_mutation();
    DROP TABLE IF EXISTS cost_events CASCADE;
  `);
}
