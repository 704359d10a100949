import type { BusinessRecord } from '../../search/search.types';

/** An email offered by a strategy, already scored. */
export interface EmailCandidate {
  email: string;
  confidence: number;
  source: string;
}

export type StrategyOutcome =
  | { kind: 'match'; candidates: EmailCandidate[]; contactName: string | null }
  | { kind: 'no_match'; reason: string }
  /**
   * `responseReceived` tells the waterfall whether a paid call completed
   * (and must be recorded) or never got an answer (and its reservation can
   * be released).
   */
  | { kind: 'error'; message: string; responseReceived: boolean };

/**
 * One way of finding emails for a business. Strategies never throw for
 * per-business problems; they return an `error` outcome instead.
 */
export interface EnrichmentStrategy {
  readonly slug: string;
  readonly displayName: string;
  /** Ledger provider id and endpoint, used when the strategy is billable. */
  readonly provider: string;
  readonly endpoint: string;
  readonly billable: boolean;
  readonly estimatedCost: number;
  attempt(business: BusinessRecord, signal: AbortSignal): Promise<StrategyOutcome>;
}
