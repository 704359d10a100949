import { describe, it, expect, beforeEach } from 'vitest';
import { CostGovernor } from '../cost/cost-governor';
import type { BudgetPolicy } from '../cost/cost.types';
import { sleep } from '../../shared/async';
import { EnrichmentCache } from './enrichment-cache';
import type { EnrichmentStrategy } from './strategies/types';
import { EnrichmentWaterfall, type WaterfallConfig } from './waterfall';
import { InMemoryCostLedger } from '../../../tests/support/in-memory-cost-ledger';
import {
  InMemoryCacheStore,
  InMemoryResultStore,
  makeBusiness,
  matchOutcome,
  scriptedStrategy,
} from '../../../tests/support/in-memory-enrichment';

const ENRICHED_AT = new Date('2026-10-21T12:00:00.000Z');

describe('EnrichmentWaterfall', () => {
  let ledger: InMemoryCostLedger;
  let governor: CostGovernor;
  let cacheStore: InMemoryCacheStore;
  let cache: EnrichmentCache;
  let results: InMemoryResultStore;

  function makeWaterfall(
    strategies: EnrichmentStrategy[],
    overrides: Partial<WaterfallConfig> & { policy?: BudgetPolicy } = {},
  ): EnrichmentWaterfall {
    const { policy, ...rest } = overrides;
    governor = new CostGovernor({
      policy: policy ?? { global: {}, providers: {} },
      ledger,
      searchCostPerPage: 0.00165,
      searchMaxPages: 6,
    });
    return new EnrichmentWaterfall({
      strategies,
      budget: governor,
      cache,
      results,
      threshold: 0.7,
      maxEmails: 1,
      strategyTimeoutMs: 1000,
      clock: () => ENRICHED_AT,
      ...rest,
    });
  }

  const noMatch = (slug: string) => scriptedStrategy(slug, async () => ({ kind: 'no_match', reason: 'nothing' }));

  beforeEach(() => {
    ledger = new InMemoryCostLedger();
    cacheStore = new InMemoryCacheStore();
    cache = new EnrichmentCache(cacheStore, 3600);
    results = new InMemoryResultStore();
  });

  it('accepts a paid match over the threshold and records one billable event', async () => {
    const website = noMatch('website_scrape');
    const hunter = scriptedStrategy(
      'hunter',
      async () => matchOutcome('owner@business1.example.com', 0.85, 'hunter', 'Dana Reyes'),
      { billable: true, cost: 0.049 },
    );
    const pattern = scriptedStrategy('pattern', async () => matchOutcome('info@business1.example.com', 0.7, 'pattern'));
    const waterfall = makeWaterfall([website, hunter, pattern]);

    const result = await waterfall.enrich(makeBusiness(1));

    expect(result).toEqual({
      placeId: 'place-1',
      emails: [{ email: 'owner@business1.example.com', confidence: 0.85, source: 'hunter' }],
      contactName: 'Dana Reyes',
      enrichmentFailed: false,
      enrichedAt: ENRICHED_AT,
    });
    expect(pattern.calls).toEqual([]);
    expect(ledger.events.map((e) => [e.provider, e.cost, e.success])).toEqual([['hunter', 0.049, true]]);
  });

  it('answers from the cache without running strategies or spending', async () => {
    const hunter = scriptedStrategy('hunter', async () => matchOutcome('x@business1.example.com', 0.9, 'hunter'), {
      billable: true,
      cost: 0.049,
    });
    const waterfall = makeWaterfall([hunter]);
    await cache.store('domain:business1.example.com', {
      placeId: 'place-1',
      emails: [{ email: 'info@business1.example.com', confidence: 0.8, source: 'website_scrape' }],
      contactName: null,
      enrichmentFailed: false,
      enrichedAt: new Date('2026-10-01T00:00:00.000Z'),
    });

    const result = await waterfall.enrich(makeBusiness(1));

    expect(hunter.calls).toEqual([]);
    expect(ledger.events).toHaveLength(0);
    expect(result?.emails).toEqual([{ email: 'info@business1.example.com', confidence: 0.8, source: 'website_scrape' }]);
    expect(result?.enrichedAt).toEqual(new Date('2026-10-01T00:00:00.000Z'));
  });

  it('shares a cached result between businesses on the same domain', async () => {
    const pattern = scriptedStrategy('pattern', async () => matchOutcome('info@shared.example.org', 0.7, 'pattern'));
    const waterfall = makeWaterfall([pattern]);

    await waterfall.enrich(makeBusiness(1, { website: 'https://www.shared.example.org' }));
    const second = await waterfall.enrich(makeBusiness(2, { website: 'http://shared.example.org/locations' }));

    expect(pattern.calls).toEqual(['place-1']);
    expect(second?.placeId).toBe('place-2');
    expect(await results.findCurrent('place-2')).toEqual(second);
  });

  it('runs one waterfall for businesses on the same domain enriched at the same time', async () => {
    const hunter = scriptedStrategy(
      'hunter',
      async () => {
        await sleep(50);
        return matchOutcome('owner@shared.example.org', 0.85, 'hunter');
      },
      { billable: true, cost: 0.049 },
    );
    const waterfall = makeWaterfall([hunter]);

    const [first, second] = await Promise.all([
      waterfall.enrich(makeBusiness(1, { website: 'https://shared.example.org' })),
      waterfall.enrich(makeBusiness(2, { website: 'https://www.shared.example.org/contact' })),
    ]);

    expect(hunter.calls).toEqual(['place-1']);
    expect(ledger.events).toHaveLength(1);
    expect(first?.placeId).toBe('place-1');
    expect(second?.placeId).toBe('place-2');
    expect(second?.emails).toEqual([{ email: 'owner@shared.example.org', confidence: 0.85, source: 'hunter' }]);
    expect(await results.findCurrent('place-2')).toEqual(second);
  });

  it('runs its own waterfall when the lookup it waited on was cancelled', async () => {
    const pattern = scriptedStrategy('pattern', async () => {
      await sleep(20);
      return matchOutcome('info@shared.example.org', 0.7, 'pattern');
    });
    const waterfall = makeWaterfall([noMatch('website_scrape'), pattern]);
    let cancelled = false;

    const [first, second] = await Promise.all([
      waterfall.enrich(makeBusiness(1, { website: 'https://shared.example.org' }), {
        isCancelled: () => cancelled,
      }),
      (async () => {
        cancelled = true;
        return waterfall.enrich(makeBusiness(2, { website: 'https://shared.example.org' }));
      })(),
    ]);

    expect(first).toBeNull();
    expect(second?.emails[0]?.email).toBe('info@shared.example.org');
    expect(pattern.calls).toEqual(['place-2']);
  });

  it('keeps going when the ledger cannot take a paid call', async () => {
    const hunter = scriptedStrategy('hunter', async () => ({ kind: 'no_match', reason: 'unknown domain' }), {
      billable: true,
      cost: 0.049,
    });
    const pattern = scriptedStrategy('pattern', async () => matchOutcome('info@business1.example.com', 0.7, 'pattern'));
    const waterfall = makeWaterfall([hunter, pattern], {
      policy: { global: { month: { maxCost: 1 } }, providers: {} },
    });
    ledger.failAppends = 2;

    const result = await waterfall.enrich(makeBusiness(1));

    expect(result?.emails).toEqual([{ email: 'info@business1.example.com', confidence: 0.7, source: 'pattern' }]);
    expect(ledger.events).toHaveLength(0);
    const month = governor.getWindows().find((w) => w.scope === '*' && w.kind === 'month');
    expect(month?.cumulativeCost).toBe(0.049);
    expect(governor.outstandingGrants).toBe(0);
  });

  it('returns the result when it cannot be persisted', async () => {
    const pattern = scriptedStrategy('pattern', async () => matchOutcome('info@business1.example.com', 0.7, 'pattern'));
    const waterfall = makeWaterfall([pattern]);
    results.failSaves = 1;

    const result = await waterfall.enrich(makeBusiness(1));

    expect(result?.emails[0]?.email).toBe('info@business1.example.com');
    expect(await results.findCurrent('place-1')).toBeNull();
    expect(await cache.lookup('domain:business1.example.com')).toEqual(result);
  });

  it('skips a billable strategy when the budget denies it', async () => {
    const hunter = scriptedStrategy('hunter', async () => matchOutcome('x@business1.example.com', 0.9, 'hunter'), {
      billable: true,
      cost: 0.049,
    });
    const pattern = scriptedStrategy('pattern', async () => matchOutcome('info@business1.example.com', 0.7, 'pattern'));
    const waterfall = makeWaterfall([hunter, pattern], {
      policy: { global: {}, providers: { hunter: { month: { maxCost: 0.01 } } } },
    });

    const result = await waterfall.enrich(makeBusiness(1));

    expect(hunter.calls).toEqual([]);
    expect(result?.emails[0]).toEqual({ email: 'info@business1.example.com', confidence: 0.7, source: 'pattern' });
    expect(ledger.events).toHaveLength(0);
  });

  it('records the cost of a paid result below the threshold and moves on', async () => {
    const hunter = scriptedStrategy('hunter', async () => matchOutcome('x@business1.example.com', 0.5, 'hunter'), {
      billable: true,
      cost: 0.049,
    });
    const pattern = scriptedStrategy('pattern', async () => matchOutcome('info@business1.example.com', 0.7, 'pattern'));
    const waterfall = makeWaterfall([hunter, pattern]);

    const result = await waterfall.enrich(makeBusiness(1));

    expect(result?.emails.map((e) => e.source)).toEqual(['pattern']);
    expect(ledger.events).toHaveLength(1);
    expect(ledger.events[0].cost).toBe(0.049);
  });

  it('continues after a strategy times out and releases its reservation', async () => {
    const slow = scriptedStrategy(
      'hunter',
      (_business, signal) =>
        new Promise((resolve) => {
          signal.addEventListener('abort', () => resolve({ kind: 'no_match', reason: 'aborted' }));
        }),
      { billable: true, cost: 0.049 },
    );
    const pattern = scriptedStrategy('pattern', async () => matchOutcome('info@business1.example.com', 0.7, 'pattern'));
    const waterfall = makeWaterfall([slow, pattern], { strategyTimeoutMs: 20 });

    const result = await waterfall.enrich(makeBusiness(1));

    expect(slow.calls).toEqual(['place-1']);
    expect(result?.emails[0].source).toBe('pattern');
    expect(ledger.events).toHaveLength(0);
    expect(governor.outstandingGrants).toBe(0);
  });

  it('continues after a strategy throws', async () => {
    const broken = scriptedStrategy('website_scrape', async () => {
      throw new Error('parser exploded');
    });
    const pattern = scriptedStrategy('pattern', async () => matchOutcome('info@business1.example.com', 0.7, 'pattern'));

    const result = await makeWaterfall([broken, pattern]).enrich(makeBusiness(1));

    expect(result?.enrichmentFailed).toBe(false);
  });

  it('releases a paid call that got no response and records one that did', async () => {
    const unreachable = scriptedStrategy(
      'hunter',
      async () => ({ kind: 'error', message: 'connect ECONNREFUSED', responseReceived: false }),
      { billable: true, cost: 0.049 },
    );
    const rejected = scriptedStrategy(
      'paid_two',
      async () => ({ kind: 'error', message: 'HTTP 500', responseReceived: true }),
      { billable: true, cost: 0.02 },
    );
    const waterfall = makeWaterfall([unreachable, rejected]);

    const result = await waterfall.enrich(makeBusiness(1));

    expect(result?.enrichmentFailed).toBe(true);
    expect(ledger.events.map((e) => [e.provider, e.cost, e.success, e.errorMessage])).toEqual([
      ['paid_two', 0, false, 'HTTP 500'],
    ]);
    expect(governor.outstandingGrants).toBe(0);
  });

  it('marks the business failed when nothing is accepted and caches that outcome', async () => {
    const waterfall = makeWaterfall([noMatch('website_scrape'), noMatch('pattern')]);

    const result = await waterfall.enrich(makeBusiness(3));

    expect(result).toEqual({
      placeId: 'place-3',
      emails: [],
      contactName: null,
      enrichmentFailed: true,
      enrichedAt: ENRICHED_AT,
    });
    expect(await cache.lookup('domain:business3.example.com')).toEqual(result);
    expect(await results.findCurrent('place-3')).toEqual(result);
  });

  it('keys businesses without a website by place id', async () => {
    const waterfall = makeWaterfall([noMatch('pattern')]);

    await waterfall.enrich(makeBusiness(4, { website: null }));

    expect([...cacheStore.entries.keys()]).toEqual(['place:place-4']);
  });

  it('collects up to maxEmails distinct emails across strategies, best first', async () => {
    const website = scriptedStrategy('website_scrape', async () => ({
      kind: 'match',
      candidates: [
        { email: 'info@business1.example.com', confidence: 0.8, source: 'website_scrape' },
        { email: 'low@business1.example.com', confidence: 0.3, source: 'website_scrape' },
      ],
      contactName: null,
    }));
    const pattern = scriptedStrategy('pattern', async () => ({
      kind: 'match',
      candidates: [
        { email: 'info@business1.example.com', confidence: 0.7, source: 'pattern' },
        { email: 'contact@business1.example.com', confidence: 0.7, source: 'pattern' },
        { email: 'hello@business1.example.com', confidence: 0.7, source: 'pattern' },
        { email: 'office@business1.example.com', confidence: 0.7, source: 'pattern' },
      ],
      contactName: null,
    }));
    const hunter = scriptedStrategy('hunter', async () => matchOutcome('top@business1.example.com', 0.95, 'hunter'), {
      billable: true,
      cost: 0.049,
    });
    const waterfall = makeWaterfall([website, pattern, hunter], { maxEmails: 3 });

    const result = await waterfall.enrich(makeBusiness(1));

    expect(result?.emails.map((e) => e.email)).toEqual([
      'info@business1.example.com',
      'contact@business1.example.com',
      'hello@business1.example.com',
    ]);
    expect(hunter.calls).toEqual([]);
  });

  it('caps maxEmails at three', async () => {
    const pattern = scriptedStrategy('pattern', async () => ({
      kind: 'match',
      candidates: ['a', 'b', 'c', 'd'].map((local) => ({
        email: `${local}@business1.example.com`,
        confidence: 0.9,
        source: 'pattern',
      })),
      contactName: null,
    }));

    const result = await makeWaterfall([pattern], { maxEmails: 10 }).enrich(makeBusiness(1));

    expect(result?.emails).toHaveLength(3);
  });

  it('stops without persisting when cancelled', async () => {
    const pattern = scriptedStrategy('pattern', async () => matchOutcome('info@business1.example.com', 0.7, 'pattern'));

    const result = await makeWaterfall([pattern]).enrich(makeBusiness(1), { isCancelled: () => true });

    expect(result).toBeNull();
    expect(pattern.calls).toEqual([]);
    expect(results.history).toHaveLength(0);
    expect(cacheStore.entries.size).toBe(0);
  });

  it('runs strategies again once the cached entry expires', async () => {
    let now = Date.parse('2026-10-21T12:00:00.000Z');
    cacheStore = new InMemoryCacheStore(() => now);
    cache = new EnrichmentCache(cacheStore, 60);
    const pattern = scriptedStrategy('pattern', async () => matchOutcome('info@business1.example.com', 0.7, 'pattern'));
    const waterfall = makeWaterfall([pattern]);

    await waterfall.enrich(makeBusiness(1));
    now += 61_000;
    await waterfall.enrich(makeBusiness(1));

    expect(pattern.calls).toEqual(['place-1', 'place-1']);
  });
});
