import { describe, it, expect } from 'vitest';
import { extractDomain, findEmails, isValidEmail, scoreEmail } from './email';

describe('extractDomain', () => {
  it('lowercases the host and drops www', () => {
    expect(extractDomain('https://www.Acme.org/contact')).toBe('acme.org');
  });

  it('accepts a bare host with a path', () => {
    expect(extractDomain('acme.org/contact')).toBe('acme.org');
  });

  it('keeps subdomains other than www', () => {
    expect(extractDomain('http://shop.acme.org')).toBe('shop.acme.org');
  });

  it('returns null for missing or dotless hosts', () => {
    expect(extractDomain(null)).toBeNull();
    expect(extractDomain('   ')).toBeNull();
    expect(extractDomain('localhost')).toBeNull();
  });
});

describe('isValidEmail', () => {
  it('accepts ordinary addresses', () => {
    expect(isValidEmail('owner@acme.org')).toBe(true);
  });

  it('rejects placeholder domains and image names', () => {
    expect(isValidEmail('jane@example.com')).toBe(false);
    expect(isValidEmail('image@acme.org')).toBe(false);
    expect(isValidEmail('someone@yoursite.com')).toBe(false);
  });

  it('rejects malformed addresses', () => {
    expect(isValidEmail('owner@acme')).toBe(false);
    expect(isValidEmail('')).toBe(false);
  });
});

describe('findEmails', () => {
  it('finds plain and spelled-out addresses in order', () => {
    expect(findEmails('Write to Sales@Acme.org, or bob at acme dot org.')).toEqual([
      'sales@acme.org',
      'bob@acme.org',
    ]);
  });

  it('returns each address once', () => {
    expect(findEmails('info@acme.org and again info@acme.org')).toEqual(['info@acme.org']);
  });

  it('skips excluded addresses', () => {
    expect(findEmails('placeholder: jane@example.com')).toEqual([]);
  });
});

describe('scoreEmail', () => {
  it('adds the domain and role bonuses', () => {
    expect(scoreEmail('info@acme.org', 0.4, 'acme.org')).toBe(0.7);
  });

  it('treats subdomains of the website as matching', () => {
    expect(scoreEmail('owner@mail.acme.org', 0.7, 'acme.org')).toBe(0.9);
  });

  it('penalises no-reply addresses', () => {
    expect(scoreEmail('noreply@acme.org', 0.7, 'acme.org')).toBe(0.6);
  });

  it('penalises the generic admin mailbox', () => {
    expect(scoreEmail('admin@gmail.com', 0.4, 'acme.org')).toBe(0.2);
  });

  it('clamps to [0, 1]', () => {
    expect(scoreEmail('info@acme.org', 0.9, 'acme.org')).toBe(1);
    expect(scoreEmail('test@acme.org', 0.2, null)).toBe(0);
  });
});
