import type { BusinessRecord } from '../../search/search.types';
import { extractDomain, isValidEmail, scoreEmail } from './email';
import type { EnrichmentStrategy, StrategyOutcome } from './types';

export const PATTERN_SLUG = 'pattern';

const BASE_CONFIDENCE = 0.4;
const ROLE_LOCAL_PARTS = ['info', 'contact', 'hello', 'admin', 'support', 'sales', 'office'];

/** Guesses for a business, most likely first. */
export function guessEmails(businessName: string, domain: string): string[] {
  const guesses = ROLE_LOCAL_PARTS.map((local) => `${local}@${domain}`);

  const firstWord = businessName
    .toLowerCase()
    .replace(/[^\w\s]/g, '')
    .split(/\s+/)
    .find(Boolean);
  if (firstWord) {
    const local = firstWord.slice(0, 10);
    guesses.push(`${local}@${domain}`, `${local}.info@${domain}`);
  }

  return [...new Set(guesses)].filter(isValidEmail);
}

/** Free strategy: common role addresses on the website's domain. */
export function createPatternStrategy(): EnrichmentStrategy {
  return {
    slug: PATTERN_SLUG,
    displayName: 'Pattern guess',
    provider: 'pattern',
    endpoint: 'guess',
    billable: false,
    estimatedCost: 0,

    async attempt(business: BusinessRecord): Promise<StrategyOutcome> {
      const domain = extractDomain(business.website);
      if (!domain) return { kind: 'no_match', reason: 'Business has no website domain' };

      const candidates = guessEmails(business.name, domain)
        .map((email) => ({ email, confidence: scoreEmail(email, BASE_CONFIDENCE, domain), source: PATTERN_SLUG }))
        .sort((a, b) => b.confidence - a.confidence);

      return { kind: 'match', candidates, contactName: null };
    },
  };
}
