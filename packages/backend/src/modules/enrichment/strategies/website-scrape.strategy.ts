import * as cheerio from 'cheerio';
import { describeError, logger } from '../../../shared/logger';
import type { BusinessRecord } from '../../search/search.types';
import { cleanEmail, extractDomain, findEmails, isValidEmail, scoreEmail } from './email';
import type { EnrichmentStrategy, StrategyOutcome } from './types';

export const WEBSITE_SCRAPE_SLUG = 'website_scrape';

const BASE_CONFIDENCE = 0.7;
const CONTACT_PATHS = ['/contact', '/contact-us', '/contact.html'];
const USER_AGENT = 'Mozilla/5.0 (compatible; leadsmith/1.0)';

const LABELLED_NAME_PATTERNS = [
  /(?:Contact|Manager|Owner|Director|CEO|President):\s*([A-Z][a-z]+\s+[A-Z][a-z]+)/g,
  /([A-Z][a-z]+\s+[A-Z][a-z]+)\s*,\s*(?:Manager|Director|Owner|CEO)\b/g,
];
const NAME_SELECTORS = [
  '.contact-name',
  '.manager',
  '.owner',
  '.director',
  '.team-member',
  '.staff-name',
  '.contact-person',
];
const FULL_NAME = /^[A-Z][a-z]+\s+[A-Z][a-z]+$/;

interface PageScan {
  emails: string[];
  names: string[];
}

/** Null when the link's percent-encoding is malformed. */
function mailtoAddress(href: string): string | null {
  try {
    return cleanEmail(decodeURIComponent(href.slice('mailto:'.length).split('?')[0]));
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}

export function scanPage(html: string): PageScan {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();

  const emails = new Set<string>();
  $('a[href^="mailto:"]').each((_, el) => {
    const href = $(el).attr('href') ?? '';
    const address = mailtoAddress(href);
    if (address !== null && isValidEmail(address)) emails.add(address);
  });

  const text = $('body').text().replace(/\s+/g, ' ');
  for (const email of findEmails(text)) emails.add(email);

  const names = new Set<string>();
  for (const pattern of LABELLED_NAME_PATTERNS) {
    for (const match of text.matchAll(pattern)) names.add(match[1]);
  }
  for (const selector of NAME_SELECTORS) {
    $(selector).each((_, el) => {
      const candidate = $(el).text().trim().replace(/\s+/g, ' ');
      if (FULL_NAME.test(candidate)) names.add(candidate);
    });
  }

  return { emails: [...emails], names: [...names] };
}

async function fetchHtml(url: string, signal: AbortSignal): Promise<string | null> {
  const response = await fetch(url, {
    headers: { 'User-Agent': USER_AGENT, Accept: 'text/html' },
    redirect: 'follow',
    signal,
  });
  if (!response.ok) return null;
  return response.text();
}

function homepageUrl(website: string): string {
  return /^https?:\/\//i.test(website) ? website : `https://${website}`;
}

/**
 * Free strategy: reads the business homepage and a few contact pages and
 * collects addresses from text and mailto links.
 */
export function createWebsiteScrapeStrategy(): EnrichmentStrategy {
  return {
    slug: WEBSITE_SCRAPE_SLUG,
    displayName: 'Website scrape',
    provider: 'website',
    endpoint: 'scrape',
    billable: false,
    estimatedCost: 0,

    async attempt(business: BusinessRecord, signal: AbortSignal): Promise<StrategyOutcome> {
      const domain = extractDomain(business.website);
      if (!business.website || !domain) return { kind: 'no_match', reason: 'Business has no website' };

      const home = homepageUrl(business.website.trim());
      const urls = [home, ...CONTACT_PATHS.map((path) => new URL(path, home).toString())];

      const emails: string[] = [];
      const names: string[] = [];
      let pagesRead = 0;
      let homepageError: string | null = null;

      for (const url of urls) {
        if (signal.aborted) break;
        try {
          const html = await fetchHtml(url, signal);
          if (html === null) continue;
          pagesRead += 1;
          const scan = scanPage(html);
          for (const email of scan.emails) if (!emails.includes(email)) emails.push(email);
          for (const name of scan.names) if (!names.includes(name)) names.push(name);
        } catch (err) {
          if (url === home) homepageError = describeError(err);
          logger.debug('Website page fetch failed', { placeId: business.placeId, url, error: describeError(err) });
        }
      }

      if (pagesRead === 0) {
        return {
          kind: 'error',
          message: homepageError ?? `No readable pages on ${domain}`,
          responseReceived: false,
        };
      }
      if (emails.length === 0) return { kind: 'no_match', reason: `No emails found on ${domain}` };

      const candidates = emails
        .map((email) => ({ email, confidence: scoreEmail(email, BASE_CONFIDENCE, domain), source: WEBSITE_SCRAPE_SLUG }))
        .sort((a, b) => b.confidence - a.confidence);

      return { kind: 'match', candidates, contactName: names[0] ?? null };
    },
  };
}
