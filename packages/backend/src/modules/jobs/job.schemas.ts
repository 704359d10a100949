import { z } from 'zod';
import { DEFAULT_MAX_RESULTS, MAX_RESULTS_LIMIT } from './batch-input';

// --- Request Body Schemas ---

export const createJobBodySchema = z.object({
  query: z.string().trim().min(1).max(200),
  location: z
    .string()
    .trim()
    .max(200)
    .nullish()
    .transform((v) => (v ? v : null)),
  maxResults: z.coerce.number().int().min(1).max(MAX_RESULTS_LIMIT).default(DEFAULT_MAX_RESULTS),
});

// --- Param Schemas ---

export const jobParamsSchema = z.object({
  jobId: z.string().min(1),
});

export const batchParamsSchema = z.object({
  batchId: z.string().uuid(),
});

// --- Query Schemas ---

export const paginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

// --- Inferred Types ---

export type CreateJobBody = z.infer<typeof createJobBodySchema>;
export type JobParams = z.infer<typeof jobParamsSchema>;
export type BatchParams = z.infer<typeof batchParamsSchema>;
export type PaginationQuery = z.infer<typeof paginationQuerySchema>;
