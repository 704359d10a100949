import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file before validation
dotenv.config();

/**
 * Parses a duration string (e.g. "90s", "15m", "30d") into seconds.
 * Supported units: s, m, h, d. Returns null if the format is invalid.
 */
export function parseDurationToSeconds(duration: string): number | null {
  const match = duration.match(/^(\d+)([smhd])$/);
  if (!match) return null;
  const value = parseInt(match[1], 10);
  const multipliers: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };
  return value * multipliers[match[2]];
}

const intSchema = (fallback: string, min = 1) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().min(min));

const amountSchema = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().nonnegative());

const optionalAmountSchema = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val === '' ? undefined : Number(val)))
  .pipe(z.number().nonnegative().optional());

const windowLimitSchema = z
  .object({
    maxCost: z.number().nonnegative().optional(),
    maxRequests: z.number().int().nonnegative().optional(),
  })
  .strict();

export const providerBudgetsSchema = z.record(
  z.string().min(1),
  z
    .object({
      day: windowLimitSchema.optional(),
      week: windowLimitSchema.optional(),
      month: windowLimitSchema.optional(),
    })
    .strict(),
);

const envSchema = z.object({
  PORT: intSchema('3000'),

  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),

  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info'),

  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .url('DATABASE_URL must be a valid URL')
    .startsWith('postgresql://', 'DATABASE_URL must be a PostgreSQL connection URL'),

  REDIS_URL: z
    .string()
    .url('REDIS_URL must be a valid URL')
    .optional(),

  // Maps search provider
  SEARCH_API_URL: z
    .string()
    .url()
    .default('https://api.scrapingdog.com/google_maps'),

  SEARCH_API_KEY: z
    .string({ required_error: 'SEARCH_API_KEY is required' })
    .min(1, 'SEARCH_API_KEY must not be empty'),

  SEARCH_COST_PER_PAGE: amountSchema('0.00165'),

  SEARCH_MAX_PAGES: intSchema('6'),

  GEOCODER_URL: z
    .string()
    .url()
    .default('https://nominatim.openstreetmap.org/search'),

  // Paid email finder; the strategy is left out of the waterfall without a key
  HUNTER_API_KEY: z
    .string()
    .min(1)
    .optional(),

  HUNTER_COST_PER_CALL: amountSchema('0.049'),

  // Enrichment waterfall
  WATERFALL_ORDER: z
    .string()
    .default('website_scrape,hunter,pattern')
    .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean))
    .pipe(z.array(z.string()).min(1, 'WATERFALL_ORDER must name at least one strategy')),

  EMAIL_CONFIDENCE_THRESHOLD: z
    .string()
    .default('0.7')
    .transform(Number)
    .pipe(z.number().min(0).max(1)),

  MAX_EMAILS_PER_BUSINESS: z
    .string()
    .default('1')
    .transform(Number)
    .pipe(z.number().int().min(1).max(3)),

  STRATEGY_TIMEOUT_MS: intSchema('15000'),

  ENRICHMENT_CONCURRENCY: intSchema('5'),

  ENRICHMENT_CACHE_TTL: z
    .string()
    .default('30d')
    .refine(
      (val) => parseDurationToSeconds(val) !== null,
      { message: 'ENRICHMENT_CACHE_TTL must be in format <number><unit> where unit is s, m, h, or d (e.g. "30d")' },
    )
    .transform((val) => parseDurationToSeconds(val) ?? 0),

  // Budget caps (global, all providers)
  BUDGET_DAILY_SPEND: optionalAmountSchema,
  BUDGET_WEEKLY_SPEND: optionalAmountSchema,
  BUDGET_MONTHLY_SPEND: amountSchema('50'),
  BUDGET_DAILY_REQUESTS: intSchema('10000', 0),
  BUDGET_WEEKLY_REQUESTS: intSchema('50000', 0),
  BUDGET_MONTHLY_REQUESTS: intSchema('200000', 0),

  PROVIDER_BUDGETS: z
    .string()
    .default('{}')
    .transform((val, ctx) => {
      try {
        const parsed: unknown = JSON.parse(val);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'PROVIDER_BUDGETS must be valid JSON' });
        return z.NEVER;
      }
    })
    .pipe(providerBudgetsSchema),

  STRICT_BUDGET: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    console.error('Environment validation failed:\n' + formatted);
    process.exit(1);
  }

  return result.data;
}

export const env = validateEnv();
