import Papa from 'papaparse';
import { z } from 'zod';
import { ValidationError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import type { SearchRequest } from './job.types';

export const DEFAULT_MAX_RESULTS = 100;
export const MAX_RESULTS_LIMIT = 500;
export const MAX_BATCH_ROWS = 1000;

const rowSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  location: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : null)),
  max_results: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? Number(v.trim()) : DEFAULT_MAX_RESULTS))
    .pipe(z.number().int('max_results must be a whole number').min(1).max(MAX_RESULTS_LIMIT)),
});

export interface SkippedRow {
  /** 1-based line in the file, header included. */
  line: number;
  reason: string;
}

export interface BatchInput {
  rows: SearchRequest[];
  skipped: SkippedRow[];
}

/**
 * Reads batch rows `query, location, max_results` from CSV text. Headers are
 * matched case-insensitively; blank lines are ignored. Invalid rows are
 * skipped and reported by line; the upload fails only when none is valid.
 */
export function parseBatchCsv(csvContent: string): BatchInput {
  const parsed = Papa.parse<Record<string, string>>(csvContent, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim().toLowerCase(),
  });

  const fields = parsed.meta.fields ?? [];
  if (!fields.includes('query')) {
    throw new ValidationError('CSV must have a "query" column');
  }
  if (parsed.data.length === 0) {
    throw new ValidationError('CSV must have at least one data row');
  }
  if (parsed.data.length > MAX_BATCH_ROWS) {
    throw new ValidationError(`CSV has ${parsed.data.length} rows; the limit is ${MAX_BATCH_ROWS}`);
  }

  const rows: SearchRequest[] = [];
  const skipped: SkippedRow[] = [];
  parsed.data.forEach((raw, index) => {
    // +2: header line and 1-based numbering
    const line = index + 2;
    const result = rowSchema.safeParse(raw);
    if (!result.success) {
      const reason = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      logger.warn('Batch row skipped', { line, reason });
      skipped.push({ line, reason });
      return;
    }
    rows.push({
      query: result.data.query,
      location: result.data.location,
      maxResults: result.data.max_results,
    });
  });

  if (rows.length === 0) {
    const reasons = skipped.map((row) => `Row ${row.line}: ${row.reason}`).join('; ');
    throw new ValidationError(`CSV has no valid rows (${reasons})`);
  }
  return { rows, skipped };
}
