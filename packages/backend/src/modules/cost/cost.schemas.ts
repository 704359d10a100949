import { z } from 'zod';

// --- Query Schemas ---

export const ledgerQuerySchema = z
  .object({
    from: z.coerce.date(),
    to: z.coerce.date(),
  })
  .refine((q) => q.from.getTime() < q.to.getTime(), {
    message: '"from" must be before "to"',
    path: ['from'],
  });

export const estimateQuerySchema = z.object({
  maxResults: z.coerce.number().int().min(1).max(500),
});

// --- Inferred Types ---

export type LedgerQuery = z.infer<typeof ledgerQuerySchema>;
export type EstimateQuery = z.infer<typeof estimateQuerySchema>;
