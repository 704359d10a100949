import { query } from '../../shared/db';
import type { PlaceIndexStore } from './dedup.types';

/** First writer wins: any existing entry, whichever job owns it, is a duplicate. */
export async function tryAdmit(placeId: string, jobId: string): Promise<boolean> {
  const result = await query<{ place_id: string }>(
    `INSERT INTO place_index (place_id, job_id, processed, admitted_at)
     VALUES ($1, $2, FALSE, NOW())
     ON CONFLICT (place_id) DO NOTHING
     RETURNING place_id`,
    [placeId, jobId],
  );
  return (result.rowCount ?? 0) > 0;
}

export async function markProcessed(placeId: string): Promise<void> {
  await query(
    `UPDATE place_index SET processed = TRUE, processed_at = NOW() WHERE place_id = $1`,
    [placeId],
  );
}

export async function findPending(jobId: string): Promise<string[]> {
  const result = await query<{ place_id: string }>(
    `SELECT place_id FROM place_index
     WHERE job_id = $1 AND processed = FALSE
     ORDER BY admitted_at ASC, place_id ASC`,
    [jobId],
  );
  return result.rows.map((row) => row.place_id);
}

export const pgPlaceIndexStore: PlaceIndexStore = { tryAdmit, markProcessed, findPending };
