import { withTimeout } from '../../shared/async';
import { describeError, logger } from '../../shared/logger';
import type { BudgetGate } from '../cost/cost-governor';
import type { Grant } from '../cost/cost.types';
import type { BusinessRecord } from '../search/search.types';
import { EnrichmentCache, cacheKeyFor } from './enrichment-cache';
import type { EnrichedEmail, EnrichmentResult, EnrichmentResultStore } from './enrichment.types';
import type { EnrichmentStrategy, StrategyOutcome } from './strategies/types';

export const MAX_EMAILS_LIMIT = 3;

export interface WaterfallConfig {
  strategies: EnrichmentStrategy[];
  budget: BudgetGate;
  cache: EnrichmentCache;
  results: EnrichmentResultStore;
  threshold: number;
  /** Stop after this many accepted emails; 1 stops at the first match. */
  maxEmails: number;
  strategyTimeoutMs: number;
  clock?: () => Date;
}

export interface EnrichOptions {
  isCancelled?: () => boolean;
}

/**
 * Ordered fallback across enrichment strategies.
 *
 * A cache hit answers without running anything. Otherwise strategies run in
 * order; billable ones must be authorized first and are skipped when the
 * budget says no. A strategy that times out or fails is logged and the next
 * one runs. Whatever the outcome, the result is cached and persisted as the
 * business's current enrichment.
 */
export class EnrichmentWaterfall {
  private readonly maxEmails: number;
  private readonly clock: () => Date;
  /** Waterfalls running right now, by cache key. */
  private readonly inFlight = new Map<string, Promise<EnrichmentResult | null>>();

  constructor(private readonly config: WaterfallConfig) {
    this.maxEmails = Math.min(Math.max(1, Math.floor(config.maxEmails)), MAX_EMAILS_LIMIT);
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Returns null only when `isCancelled` fired before the waterfall finished;
   * nothing is cached or persisted in that case.
   *
   * A business whose cache key already has a waterfall running waits for it
   * and takes a copy of its result instead of paying for the same lookups.
   */
  async enrich(business: BusinessRecord, options: EnrichOptions = {}): Promise<EnrichmentResult | null> {
    const key = cacheKeyFor(business);

    const running = this.inFlight.get(key);
    if (running) {
      const shared = await running;
      if (shared) {
        logger.debug('Enrichment shared with a running lookup', { placeId: business.placeId, key });
        const result: EnrichmentResult = { ...shared, placeId: business.placeId };
        await this.persist(result);
        return result;
      }
    }

    const run = this.runWaterfall(business, key, options);
    this.inFlight.set(key, run);
    try {
      return await run;
    } finally {
      if (this.inFlight.get(key) === run) this.inFlight.delete(key);
    }
  }

  private async runWaterfall(
    business: BusinessRecord,
    key: string,
    options: EnrichOptions,
  ): Promise<EnrichmentResult | null> {
    const { cache } = this.config;

    const cached = await cache.lookup(key);
    if (cached) {
      logger.debug('Enrichment cache hit', { placeId: business.placeId, key });
      const result: EnrichmentResult = { ...cached, placeId: business.placeId };
      await this.persist(result);
      return result;
    }

    const accepted: EnrichedEmail[] = [];
    let contactName: string | null = null;
    const tried: string[] = [];

    for (const strategy of this.config.strategies) {
      if (accepted.length >= this.maxEmails) break;
      if (options.isCancelled?.()) {
        logger.info('Enrichment cancelled between strategies', { placeId: business.placeId });
        return null;
      }

      const outcome = await this.runStrategy(strategy, business);
      if (outcome === null) continue;
      tried.push(strategy.slug);

      if (outcome.kind === 'error') {
        logger.warn('Enrichment strategy failed', {
          placeId: business.placeId,
          strategy: strategy.slug,
          error: outcome.message,
        });
        continue;
      }
      if (outcome.kind === 'no_match') {
        logger.debug('Enrichment strategy found nothing', {
          placeId: business.placeId,
          strategy: strategy.slug,
          reason: outcome.reason,
        });
        continue;
      }

      const fresh = outcome.candidates.filter(
        (c) => c.confidence >= this.config.threshold && !accepted.some((a) => a.email === c.email),
      );
      if (fresh.length === 0) {
        logger.debug('Enrichment candidates below threshold', {
          placeId: business.placeId,
          strategy: strategy.slug,
          best: outcome.candidates[0]?.confidence ?? null,
          threshold: this.config.threshold,
        });
        continue;
      }
      for (const candidate of fresh) {
        if (accepted.length < this.maxEmails) accepted.push(candidate);
      }
      if (contactName === null) contactName = outcome.contactName;
    }

    const result: EnrichmentResult = {
      placeId: business.placeId,
      emails: [...accepted].sort((a, b) => b.confidence - a.confidence),
      contactName,
      enrichmentFailed: accepted.length === 0,
      enrichedAt: this.clock(),
    };

    await cache.store(key, result);
    await this.persist(result);

    logger.info('Business enriched', {
      placeId: business.placeId,
      emails: result.emails.length,
      failed: result.enrichmentFailed,
      strategies: tried,
    });
    return result;
  }

  /** A failed write is logged; the caller still gets the result. */
  private async persist(result: EnrichmentResult): Promise<void> {
    try {
      await this.config.results.saveCurrent(result);
    } catch (err) {
      logger.error('Enrichment result not persisted', { placeId: result.placeId, error: describeError(err) });
    }
  }

  /**
   * Runs one strategy under the budget and timeout. Returns null when a
   * billable strategy was denied or the attempt threw or timed out.
   */
  private async runStrategy(strategy: EnrichmentStrategy, business: BusinessRecord): Promise<StrategyOutcome | null> {
    const { budget, strategyTimeoutMs } = this.config;

    let grant: Grant | null = null;
    if (strategy.billable) {
      const authorization = budget.authorize(strategy.provider, strategy.endpoint, strategy.estimatedCost);
      if (!authorization.granted) {
        logger.info('Skipping strategy, budget denied', {
          placeId: business.placeId,
          strategy: strategy.slug,
          scope: authorization.scope,
          window: authorization.kind,
        });
        return null;
      }
      grant = authorization.grant;
    }

    let outcome: StrategyOutcome;
    try {
      outcome = await withTimeout(strategyTimeoutMs, `Strategy ${strategy.slug}`, (signal) =>
        strategy.attempt(business, signal),
      );
    } catch (err) {
      if (grant) budget.release(grant);
      logger.warn('Enrichment strategy aborted', {
        placeId: business.placeId,
        strategy: strategy.slug,
        error: describeError(err),
      });
      return null;
    }

    if (grant) {
      try {
        if (outcome.kind === 'error' && !outcome.responseReceived) {
          budget.release(grant);
        } else if (outcome.kind === 'error') {
          await budget.record(grant, 0, { success: false, errorMessage: outcome.message });
        } else {
          await budget.record(grant, strategy.estimatedCost, { success: true });
        }
      } catch (err) {
        // The spend stays counted in the windows; only the ledger row is missing
        logger.error('Strategy cost not recorded', {
          placeId: business.placeId,
          strategy: strategy.slug,
          error: describeError(err),
        });
      }
    }
    return outcome;
  }
}
