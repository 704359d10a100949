import { z } from 'zod';
import type { BusinessRecord } from '../../search/search.types';
import { extractDomain, isValidEmail } from './email';
import type { EnrichmentStrategy, StrategyOutcome } from './types';

export const HUNTER_SLUG = 'hunter';

const HUNTER_API_URL = 'https://api.hunter.io/v2/domain-search';

const domainSearchSchema = z.object({
  data: z.object({
    emails: z
      .array(
        z.object({
          value: z.string(),
          confidence: z.number().nullish(),
          first_name: z.string().nullish(),
          last_name: z.string().nullish(),
        }),
      )
      .default([]),
  }),
});

export interface HunterStrategyConfig {
  apiKey: string;
  costPerCall: number;
  maxEmails: number;
  apiUrl?: string;
}

/**
 * Hunter domain-search strategy.
 *
 * One GET per business with a website. Hunter's own 0-100 confidence is used
 * as the candidate score. Each completed call costs `costPerCall`.
 */
export function createHunterStrategy(config: HunterStrategyConfig): EnrichmentStrategy {
  const apiUrl = config.apiUrl ?? HUNTER_API_URL;

  return {
    slug: HUNTER_SLUG,
    displayName: 'Hunter',
    provider: 'hunter',
    endpoint: 'domain-search',
    billable: true,
    estimatedCost: config.costPerCall,

    async attempt(business: BusinessRecord, signal: AbortSignal): Promise<StrategyOutcome> {
      const domain = extractDomain(business.website);
      if (!domain) return { kind: 'no_match', reason: 'Business has no website domain' };

      const params = new URLSearchParams({
        domain,
        api_key: config.apiKey,
        limit: String(config.maxEmails),
      });

      let response: Response;
      try {
        response = await fetch(`${apiUrl}?${params.toString()}`, { method: 'GET', signal });
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : 'Unknown error calling Hunter API';
        return { kind: 'error', message, responseReceived: false };
      }

      if (!response.ok) {
        const text = await response.text().catch(() => 'Unknown error');
        return { kind: 'error', message: `Hunter API error ${response.status}: ${text}`, responseReceived: true };
      }

      const parsed = domainSearchSchema.safeParse(await response.json().catch(() => null));
      if (!parsed.success) {
        return { kind: 'error', message: 'Hunter API returned an unexpected body', responseReceived: true };
      }

      const emails = parsed.data.data.emails.filter((e) => isValidEmail(e.value.toLowerCase()));
      if (emails.length === 0) return { kind: 'no_match', reason: `Hunter has no emails for ${domain}` };

      const candidates = emails
        .map((e) => ({
          email: e.value.toLowerCase(),
          confidence: Math.min(1, Math.max(0, Math.round(e.confidence ?? 0) / 100)),
          source: HUNTER_SLUG,
        }))
        .sort((a, b) => b.confidence - a.confidence);

      const named = emails.find((e) => e.first_name || e.last_name);
      const contactName = named ? `${named.first_name ?? ''} ${named.last_name ?? ''}`.trim() : null;

      return { kind: 'match', candidates, contactName };
    },
  };
}
