import { query } from '../../shared/db';
import type { CostEvent, CostLedgerStore, NewCostEvent } from './cost.types';

interface CostEventRow {
  id: string;
  provider: string;
  endpoint: string;
  cost: string;
  created_at: Date;
  success: boolean;
  error_message: string | null;
}

function toCostEvent(row: CostEventRow): CostEvent {
  return {
    id: row.id,
    provider: row.provider,
    endpoint: row.endpoint,
    cost: Number(row.cost),
    timestamp: row.created_at,
    success: row.success,
    errorMessage: row.error_message,
  };
}

const COST_EVENT_COLUMNS = 'id, provider, endpoint, cost, created_at, success, error_message';

/**
 * Appends one event to the ledger. Rows are never updated or deleted.
 */
export async function insertEvent(event: NewCostEvent): Promise<CostEvent> {
  const result = await query<CostEventRow>(
    `INSERT INTO cost_events (id, provider, endpoint, cost, created_at, success, error_message)
     VALUES (gen_random_uuid(), $1, $2, $3, $4, $5, $6)
     RETURNING ${COST_EVENT_COLUMNS}`,
    [event.provider, event.endpoint, event.cost, event.timestamp, event.success, event.errorMessage],
  );
  return toCostEvent(result.rows[0]);
}

/**
 * Events with `from <= created_at < to`, oldest first.
 */
export async function findInRange(from: Date, to: Date): Promise<CostEvent[]> {
  const result = await query<CostEventRow>(
    `SELECT ${COST_EVENT_COLUMNS}
     FROM cost_events
     WHERE created_at >= $1 AND created_at < $2
     ORDER BY created_at ASC, id ASC`,
    [from, to],
  );
  return result.rows.map(toCostEvent);
}

export const pgCostLedgerStore: CostLedgerStore = {
  append: insertEvent,
  listRange: findInRange,
};
