import { query, withTransaction } from '../../shared/db';
import type { BusinessRow } from '../search/business.repository';
import { toBusinessRecord } from '../search/business.repository';
import {
  toOutputRecord,
  type EnrichedEmail,
  type EnrichmentResult,
  type EnrichmentResultStore,
  type JobOutputReader,
  type OutputRecord,
  type PageOptions,
  type PaginatedResult,
} from './enrichment.types';

interface EnrichmentResultRow {
  place_id: string;
  emails: EnrichedEmail[];
  contact_name: string | null;
  enrichment_failed: boolean;
  enriched_at: Date;
}

function toEnrichmentResult(row: EnrichmentResultRow): EnrichmentResult {
  return {
    placeId: row.place_id,
    emails: row.emails,
    contactName: row.contact_name,
    enrichmentFailed: row.enrichment_failed,
    enrichedAt: row.enriched_at,
  };
}

const RESULT_COLUMNS = 'place_id, emails, contact_name, enrichment_failed, enriched_at';

/**
 * Stores `result` as the current version for its business. The previous
 * current row stays in the table, flagged as superseded.
 */
export async function saveCurrent(result: EnrichmentResult): Promise<void> {
  await withTransaction(async (client) => {
    await client.query(
      `UPDATE enrichment_results SET is_current = FALSE WHERE place_id = $1 AND is_current = TRUE`,
      [result.placeId],
    );
    await client.query(
      `INSERT INTO enrichment_results (id, place_id, emails, contact_name, enrichment_failed, enriched_at, is_current)
       VALUES (gen_random_uuid(), $1, $2, $3, $4, $5, TRUE)`,
      [result.placeId, JSON.stringify(result.emails), result.contactName, result.enrichmentFailed, result.enrichedAt],
    );
  });
}

export async function findCurrent(placeId: string): Promise<EnrichmentResult | null> {
  const result = await query<EnrichmentResultRow>(
    `SELECT ${RESULT_COLUMNS} FROM enrichment_results WHERE place_id = $1 AND is_current = TRUE`,
    [placeId],
  );
  return result.rows[0] ? toEnrichmentResult(result.rows[0]) : null;
}

/** Every stored version for a business, newest first. */
export async function findHistory(placeId: string): Promise<EnrichmentResult[]> {
  const result = await query<EnrichmentResultRow>(
    `SELECT ${RESULT_COLUMNS} FROM enrichment_results WHERE place_id = $1 ORDER BY enriched_at DESC`,
    [placeId],
  );
  return result.rows.map(toEnrichmentResult);
}

interface OutputRow extends BusinessRow {
  emails: EnrichedEmail[] | null;
  contact_name: string | null;
  enrichment_failed: boolean | null;
  enriched_at: Date | null;
}

function toOutput(row: OutputRow): OutputRecord {
  const business = toBusinessRecord(row);
  const enrichment: EnrichmentResult | null =
    row.enriched_at === null
      ? null
      : {
          placeId: row.place_id,
          emails: row.emails ?? [],
          contactName: row.contact_name,
          enrichmentFailed: row.enrichment_failed ?? false,
          enrichedAt: row.enriched_at,
        };
  return toOutputRecord(business, enrichment);
}

/**
 * Records admitted by `jobId` with their current enrichment, in admission order.
 */
export async function listOutputForJob(jobId: string, options: PageOptions): Promise<PaginatedResult<OutputRecord>> {
  const { page, limit } = options;
  const offset = (page - 1) * limit;

  const [dataResult, countResult] = await Promise.all([
    query<OutputRow>(
      `SELECT b.place_id, b.name, b.address, b.phone, b.website, b.latitude, b.longitude,
              b.rating, b.review_count, b.categories, b.hours, b.source_search,
              r.emails, r.contact_name, r.enrichment_failed, r.enriched_at
       FROM place_index p
       JOIN businesses b ON b.place_id = p.place_id
       LEFT JOIN enrichment_results r ON r.place_id = p.place_id AND r.is_current = TRUE
       WHERE p.job_id = $1
       ORDER BY p.admitted_at ASC, p.place_id ASC
       LIMIT $2 OFFSET $3`,
      [jobId, limit, offset],
    ),
    query<{ count: string }>(`SELECT COUNT(*) AS count FROM place_index WHERE job_id = $1`, [jobId]),
  ]);

  return {
    items: dataResult.rows.map(toOutput),
    total: parseInt(countResult.rows[0].count, 10),
    page,
    limit,
  };
}

export const pgEnrichmentResultStore: EnrichmentResultStore = { saveCurrent, findCurrent };
export const pgJobOutputReader: JobOutputReader = { listOutputForJob };
