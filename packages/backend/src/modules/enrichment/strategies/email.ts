const EMAIL_PATTERNS = [
  /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  /\b[A-Za-z0-9._%+-]+\s*@\s*[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  // "name at domain dot com"
  /\b[A-Za-z0-9._%+-]+\sat\s[A-Za-z0-9.-]+\sdot\s[A-Za-z]{2,}\b/g,
];

const VALID_EMAIL = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const EXCLUDED_PATTERNS = [
  /@example\./i,
  /@test\./i,
  /@placeholder\./i,
  /@domain\./i,
  /@company\./i,
  /@yoursite\./i,
  /image@/i,
  /photo@/i,
  /picture@/i,
];

export const PROFESSIONAL_PREFIXES = ['info@', 'contact@', 'hello@', 'admin@', 'office@'];
const SUSPICIOUS_PREFIXES = ['noreply@', 'no-reply@', 'test@', 'fake@'];
const SUSPICIOUS_ADDRESSES = ['admin@gmail.com'];

/**
 * Host of a website URL, lowercased, without a leading "www.". Accepts bare
 * hosts such as "example.org/contact".
 */
export function extractDomain(website: string | null): string | null {
  if (!website || !website.trim()) return null;
  const trimmed = website.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    const host = new URL(withScheme).hostname.toLowerCase();
    if (!host.includes('.')) return null;
    return host.startsWith('www.') ? host.slice(4) : host;
  } catch {
    return null;
  }
}

export function cleanEmail(raw: string): string {
  return raw
    .replace(/ at /gi, '@')
    .replace(/ dot /gi, '.')
    .replace(/\s+/g, '')
    .toLowerCase()
    .replace(/[.,;!?]+$/, '');
}

export function isValidEmail(email: string): boolean {
  if (!email || email.length > 254) return false;
  if (!VALID_EMAIL.test(email)) return false;
  return !EXCLUDED_PATTERNS.some((pattern) => pattern.test(email));
}

/** Distinct valid emails in `text`, in order of first appearance. */
export function findEmails(text: string): string[] {
  const found = new Set<string>();
  for (const pattern of EMAIL_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const email = cleanEmail(match[0]);
      if (isValidEmail(email)) found.add(email);
    }
  }
  return [...found];
}

function emailDomain(email: string): string {
  return email.slice(email.lastIndexOf('@') + 1);
}

/**
 * Confidence for an email found or guessed without a provider score:
 * `base`, +0.2 when it is on the website's domain, +0.1 for a role prefix,
 * -0.3 for a no-reply or throwaway prefix. Clamped to [0, 1], two decimals.
 */
export function scoreEmail(email: string, base: number, websiteDomain: string | null): number {
  const lower = email.toLowerCase();
  let confidence = base;

  if (websiteDomain) {
    const domain = emailDomain(lower);
    if (domain === websiteDomain || domain.endsWith(`.${websiteDomain}`)) confidence += 0.2;
  }
  if (PROFESSIONAL_PREFIXES.some((prefix) => lower.startsWith(prefix))) confidence += 0.1;
  if (SUSPICIOUS_PREFIXES.some((prefix) => lower.startsWith(prefix)) || SUSPICIOUS_ADDRESSES.includes(lower)) {
    confidence -= 0.3;
  }

  return Math.min(1, Math.max(0, Math.round(confidence * 100) / 100));
}
