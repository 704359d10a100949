/**
 * Catalog of enrichment strategies keyed by slug. The waterfall order is a
 * list of slugs resolved against this registry.
 */

import { ValidationError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import { HUNTER_SLUG, createHunterStrategy } from './strategies/hunter.strategy';
import { createPatternStrategy } from './strategies/pattern.strategy';
import type { EnrichmentStrategy } from './strategies/types';
import { createWebsiteScrapeStrategy } from './strategies/website-scrape.strategy';

export interface IStrategyRegistry {
  getStrategy(slug: string): EnrichmentStrategy | undefined;
  getAllStrategies(): EnrichmentStrategy[];
  resolveOrder(slugs: string[]): EnrichmentStrategy[];
  estimateCost(records: number, slugs: string[]): number;
}

export class StrategyRegistry implements IStrategyRegistry {
  private readonly strategies: Map<string, EnrichmentStrategy>;
  private readonly disabled: Set<string>;

  /** `disabled` names known strategies that are switched off by configuration. */
  constructor(strategies: EnrichmentStrategy[], disabled: string[] = []) {
    this.strategies = new Map();
    this.disabled = new Set(disabled);

    for (const strategy of strategies) {
      if (this.strategies.has(strategy.slug)) {
        throw new ValidationError(`Duplicate strategy slug: "${strategy.slug}"`);
      }
      if (!Number.isFinite(strategy.estimatedCost) || strategy.estimatedCost < 0) {
        throw new ValidationError(
          `Strategy "${strategy.slug}" must have a non-negative cost, got ${strategy.estimatedCost}`,
        );
      }
      this.strategies.set(strategy.slug, strategy);
    }
  }

  getStrategy(slug: string): EnrichmentStrategy | undefined {
    return this.strategies.get(slug);
  }

  getAllStrategies(): EnrichmentStrategy[] {
    return Array.from(this.strategies.values());
  }

  /**
   * Strategies for `slugs` in the given order. Disabled slugs are dropped,
   * unknown ones rejected.
   */
  resolveOrder(slugs: string[]): EnrichmentStrategy[] {
    const unknown = slugs.filter((s) => !this.strategies.has(s) && !this.disabled.has(s));
    if (unknown.length > 0) {
      throw new ValidationError(`Unknown strategy slug(s): ${unknown.join(', ')}`);
    }
    const skipped = slugs.filter((s) => this.disabled.has(s));
    if (skipped.length > 0) {
      logger.warn('Skipping disabled enrichment strategies', { strategies: skipped });
    }
    const seen = new Set<string>();
    const ordered: EnrichmentStrategy[] = [];
    for (const slug of slugs) {
      const strategy = this.strategies.get(slug);
      if (strategy && !seen.has(slug)) {
        seen.add(slug);
        ordered.push(strategy);
      }
    }
    return ordered;
  }

  /** Worst case: every billable strategy in the order runs for every record. */
  estimateCost(records: number, slugs: string[]): number {
    const perRecord = this.resolveOrder(slugs)
      .filter((s) => s.billable)
      .reduce((sum, s) => sum + s.estimatedCost, 0);
    return Math.round(records * perRecord * 1e6) / 1e6;
  }
}

export interface StrategyRegistryConfig {
  hunterApiKey?: string;
  hunterCostPerCall: number;
  maxEmails: number;
}

/**
 * Registry with the built-in strategies. Hunter is only registered when an
 * API key is configured.
 */
export function createStrategyRegistry(config: StrategyRegistryConfig): StrategyRegistry {
  const strategies: EnrichmentStrategy[] = [createWebsiteScrapeStrategy()];
  const disabled: string[] = [];
  if (!config.hunterApiKey) {
    disabled.push(HUNTER_SLUG);
  } else {
    strategies.push(
      createHunterStrategy({
        apiKey: config.hunterApiKey,
        costPerCall: config.hunterCostPerCall,
        maxEmails: config.maxEmails,
      }),
    );
  }
  strategies.push(createPatternStrategy());
  return new StrategyRegistry(strategies, disabled);
}
