import { query } from '../../shared/db';
import type { SearchCheckpoint } from '../search/search.types';
import type { Job, JobKind, JobStatus, JobStore, JobUpdate, NewJob } from './job.types';

interface JobRow {
  id: string;
  kind: JobKind;
  batch_id: string | null;
  query: string;
  location: string | null;
  max_results: number;
  status: JobStatus;
  total_records: number;
  processed_records: number;
  enriched_records: number;
  failed_records: number;
  error_message: string | null;
  last_checkpoint: SearchCheckpoint | null;
  created_at: Date;
  updated_at: Date;
}

function toJob(row: JobRow): Job {
  return {
    id: row.id,
    kind: row.kind,
    batchId: row.batch_id,
    query: row.query,
    location: row.location,
    maxResults: row.max_results,
    status: row.status,
    totalRecords: row.total_records,
    processedRecords: row.processed_records,
    enrichedRecords: row.enriched_records,
    failedRecords: row.failed_records,
    errorMessage: row.error_message,
    lastCheckpoint: row.last_checkpoint,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const JOB_COLUMNS =
  'id, kind, batch_id, query, location, max_results, status, total_records, processed_records, enriched_records, failed_records, error_message, last_checkpoint, created_at, updated_at';

const UPDATE_COLUMNS: Array<[keyof JobUpdate, string]> = [
  ['status', 'status'],
  ['totalRecords', 'total_records'],
  ['processedRecords', 'processed_records'],
  ['enrichedRecords', 'enriched_records'],
  ['failedRecords', 'failed_records'],
  ['errorMessage', 'error_message'],
  ['lastCheckpoint', 'last_checkpoint'],
];

export async function createJob(data: NewJob): Promise<Job> {
  const result = await query<JobRow>(
    `INSERT INTO jobs (kind, batch_id, query, location, max_results, status)
     VALUES ($1, $2, $3, $4, $5, 'queued')
     RETURNING ${JOB_COLUMNS}`,
    [data.kind, data.batchId, data.query, data.location, data.maxResults],
  );
  return toJob(result.rows[0]);
}

export async function getJobById(jobId: string): Promise<Job | null> {
  const result = await query<JobRow>(`SELECT ${JOB_COLUMNS} FROM jobs WHERE id = $1`, [jobId]);
  return result.rows[0] ? toJob(result.rows[0]) : null;
}

export async function updateJob(jobId: string, changes: JobUpdate): Promise<Job | null> {
  const setClauses: string[] = ['updated_at = NOW()'];
  const params: unknown[] = [jobId];
  let paramIndex = 2;

  for (const [key, column] of UPDATE_COLUMNS) {
    const value = changes[key];
    if (value === undefined) continue;
    setClauses.push(`${column} = $${paramIndex}`);
    params.push(key === 'lastCheckpoint' && value !== null ? JSON.stringify(value) : value);
    paramIndex++;
  }

  const result = await query<JobRow>(
    `UPDATE jobs SET ${setClauses.join(', ')} WHERE id = $1 RETURNING ${JOB_COLUMNS}`,
    params,
  );
  return result.rows[0] ? toJob(result.rows[0]) : null;
}

export async function listJobsByBatch(batchId: string): Promise<Job[]> {
  const result = await query<JobRow>(
    `SELECT ${JOB_COLUMNS} FROM jobs WHERE batch_id = $1 ORDER BY created_at ASC, id ASC`,
    [batchId],
  );
  return result.rows.map(toJob);
}

export const pgJobStore: JobStore = {
  create: createJob,
  findById: getJobById,
  update: updateJob,
  listByBatch: listJobsByBatch,
};
