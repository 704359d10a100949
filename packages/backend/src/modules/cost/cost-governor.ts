import { v4 as uuidv4 } from 'uuid';
import { ConflictError, ValidationError } from '../../shared/errors';
import { describeError, logger } from '../../shared/logger';
import { roundCost, windowEnd, windowStart } from './budget';
import {
  GLOBAL_SCOPE,
  WINDOW_KINDS,
  type Authorization,
  type BudgetPolicy,
  type BudgetWindow,
  type CallOutcome,
  type CostEvent,
  type CostLedgerStore,
  type Grant,
  type LedgerRange,
  type LedgerReport,
  type NewCostEvent,
  type SearchCostEstimate,
  type WindowKind,
  type WindowLimit,
} from './cost.types';

export interface CostGovernorOptions {
  policy: BudgetPolicy;
  ledger: CostLedgerStore;
  searchCostPerPage: number;
  searchMaxPages: number;
  searchPageSize?: number;
  clock?: () => Date;
}

interface WindowCounter {
  scope: string;
  kind: WindowKind;
  windowStart: Date;
  requestCount: number;
  cumulativeCost: number;
}

const COST_EPSILON = 1e-9;
const DEFAULT_SEARCH_PAGE_SIZE = 20;

function isValidCost(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Single owner of budget windows and the cost ledger.
 *
 * Every billable call goes through `authorize` first. A grant reserves its
 * estimate against each applicable window until it is settled with `record`
 * (the call completed) or `release` (no response arrived). The check and the
 * reservation happen without yielding to the event loop, so concurrent
 * workers sharing one governor cannot both spend the same headroom.
 *
 * Windows are aligned to UTC and roll over lazily whenever they are read.
 */
export class CostGovernor {
  private readonly counters = new Map<string, WindowCounter>();
  private readonly reservations = new Map<string, Grant>();
  private readonly clock: () => Date;

  constructor(
    private readonly options: CostGovernorOptions,
    history: CostEvent[] = [],
  ) {
    this.clock = options.clock ?? (() => new Date());
    const now = this.clock();

    for (const kind of WINDOW_KINDS) {
      this.track(GLOBAL_SCOPE, kind, now);
    }
    for (const [provider, limits] of Object.entries(options.policy.providers)) {
      for (const kind of WINDOW_KINDS) {
        if (limits[kind]) this.track(provider, kind, now);
      }
    }

    for (const event of history) {
      for (const counter of this.counters.values()) {
        if (counter.scope !== GLOBAL_SCOPE && counter.scope !== event.provider) continue;
        const ts = event.timestamp.getTime();
        if (ts >= counter.windowStart.getTime() && ts < windowEnd(counter.kind, counter.windowStart).getTime()) {
          counter.requestCount += 1;
          counter.cumulativeCost = roundCost(counter.cumulativeCost + event.cost);
        }
      }
    }
  }

  /**
   * Builds a governor whose windows are derived from the persisted ledger.
   */
  static async create(options: CostGovernorOptions): Promise<CostGovernor> {
    const now = (options.clock ?? (() => new Date()))();
    const starts = WINDOW_KINDS.map((kind) => windowStart(kind, now));
    const ends = WINDOW_KINDS.map((kind, i) => windowEnd(kind, starts[i]));
    const from = new Date(Math.min(...starts.map((d) => d.getTime())));
    const to = new Date(Math.max(...ends.map((d) => d.getTime())));

    const history = await options.ledger.listRange(from, to);
    logger.info('Cost governor loaded ledger', { events: history.length, from: from.toISOString() });
    return new CostGovernor(options, history);
  }

  get outstandingGrants(): number {
    return this.reservations.size;
  }

  authorize(provider: string, endpoint: string, estimatedCost: number): Authorization {
    if (!isValidCost(estimatedCost)) {
      throw new ValidationError(`Estimated cost must be a non-negative number, got ${estimatedCost}`);
    }

    const now = this.clock();
    for (const counter of this.countersFor(provider, now)) {
      const limit = this.limitFor(counter);
      const reserved = this.reservedFor(counter.scope);

      if (limit.maxRequests !== undefined && counter.requestCount + reserved.requests + 1 > limit.maxRequests) {
        return this.deny(counter, limit, reserved, 'request_limit', provider, endpoint);
      }
      if (
        limit.maxCost !== undefined &&
        counter.cumulativeCost + reserved.cost + estimatedCost > limit.maxCost + COST_EPSILON
      ) {
        return this.deny(counter, limit, reserved, 'cost_limit', provider, endpoint);
      }
    }

    const grant: Grant = { id: uuidv4(), provider, endpoint, estimatedCost, issuedAt: now };
    this.reservations.set(grant.id, grant);
    return { granted: true, grant };
  }

  /**
   * Settles a grant for a call that completed, whatever its business outcome,
   * and appends exactly one ledger event. A failed write is tried once more;
   * if the ledger is still down the spend stays in the window counters, the
   * event is logged in full and the error propagates.
   */
  async record(grant: Grant, actualCost: number, outcome: CallOutcome = { success: true }): Promise<CostEvent> {
    if (!isValidCost(actualCost)) {
      throw new ValidationError(`Actual cost must be a non-negative number, got ${actualCost}`);
    }
    if (!this.reservations.delete(grant.id)) {
      throw new ConflictError(`Grant ${grant.id} has already been settled`);
    }

    const now = this.clock();
    for (const counter of this.countersFor(grant.provider, now)) {
      counter.requestCount += 1;
      counter.cumulativeCost = roundCost(counter.cumulativeCost + actualCost);
    }

    const event: NewCostEvent = {
      provider: grant.provider,
      endpoint: grant.endpoint,
      cost: actualCost,
      timestamp: now,
      success: outcome.success,
      errorMessage: outcome.errorMessage ?? null,
    };
    try {
      return await this.options.ledger.append(event);
    } catch (firstErr) {
      logger.warn('Retrying cost event append', { provider: grant.provider, error: describeError(firstErr) });
    }
    try {
      return await this.options.ledger.append(event);
    } catch (err) {
      // The money is spent: budgets keep counting it even though the ledger missed it
      logger.error('Cost event not persisted', {
        ...event,
        timestamp: event.timestamp.toISOString(),
        error: describeError(err),
      });
      throw err;
    }
  }

  /** Returns the reservation of a call that never produced a response. */
  release(grant: Grant): boolean {
    return this.reservations.delete(grant.id);
  }

  getWindows(): BudgetWindow[] {
    const now = this.clock();
    return [...this.counters.values()].map((counter) => {
      this.roll(counter, now);
      const limit = this.limitFor(counter);
      return {
        scope: counter.scope,
        kind: counter.kind,
        windowStart: counter.windowStart,
        requestCount: counter.requestCount,
        cumulativeCost: counter.cumulativeCost,
        limit,
        remaining: {
          cost: limit.maxCost === undefined ? null : Math.max(0, roundCost(limit.maxCost - counter.cumulativeCost)),
          requests: limit.maxRequests === undefined ? null : Math.max(0, limit.maxRequests - counter.requestCount),
        },
      };
    });
  }

  async getLedgerReport(range: LedgerRange): Promise<LedgerReport> {
    if (range.from.getTime() >= range.to.getTime()) {
      throw new ValidationError('Ledger range start must be before its end');
    }
    const events = await this.options.ledger.listRange(range.from, range.to);
    const totalCost = roundCost(events.reduce((sum, e) => sum + e.cost, 0));
    return { from: range.from, to: range.to, events, totalCost, windows: this.getWindows() };
  }

  estimateSearchCost(maxResults: number): SearchCostEstimate {
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new ValidationError(`maxResults must be a positive integer, got ${maxResults}`);
    }
    const pageSize = this.options.searchPageSize ?? DEFAULT_SEARCH_PAGE_SIZE;
    const pages = Math.min(Math.ceil(maxResults / pageSize), this.options.searchMaxPages);
    return {
      pages,
      costPerPage: this.options.searchCostPerPage,
      estimatedCost: roundCost(pages * this.options.searchCostPerPage),
    };
  }

  private track(scope: string, kind: WindowKind, now: Date): void {
    this.counters.set(`${scope}|${kind}`, {
      scope,
      kind,
      windowStart: windowStart(kind, now),
      requestCount: 0,
      cumulativeCost: 0,
    });
  }

  private roll(counter: WindowCounter, now: Date): void {
    const start = windowStart(counter.kind, now);
    if (start.getTime() > counter.windowStart.getTime()) {
      counter.windowStart = start;
      counter.requestCount = 0;
      counter.cumulativeCost = 0;
    }
  }

  private countersFor(provider: string, now: Date): WindowCounter[] {
    const applicable: WindowCounter[] = [];
    for (const counter of this.counters.values()) {
      if (counter.scope === GLOBAL_SCOPE || counter.scope === provider) {
        this.roll(counter, now);
        applicable.push(counter);
      }
    }
    return applicable;
  }

  private limitFor(counter: WindowCounter): WindowLimit {
    const limits =
      counter.scope === GLOBAL_SCOPE ? this.options.policy.global : this.options.policy.providers[counter.scope];
    return limits?.[counter.kind] ?? {};
  }

  private reservedFor(scope: string): { cost: number; requests: number } {
    let cost = 0;
    let requests = 0;
    for (const grant of this.reservations.values()) {
      if (scope === GLOBAL_SCOPE || grant.provider === scope) {
        cost += grant.estimatedCost;
        requests += 1;
      }
    }
    return { cost, requests };
  }

  private deny(
    counter: WindowCounter,
    limit: WindowLimit,
    reserved: { cost: number; requests: number },
    reason: 'cost_limit' | 'request_limit',
    provider: string,
    endpoint: string,
  ): Authorization {
    const remaining = {
      cost:
        limit.maxCost === undefined
          ? null
          : Math.max(0, roundCost(limit.maxCost - counter.cumulativeCost - reserved.cost)),
      requests:
        limit.maxRequests === undefined
          ? null
          : Math.max(0, limit.maxRequests - counter.requestCount - reserved.requests),
    };
    logger.info('Budget authorization denied', {
      provider,
      endpoint,
      scope: counter.scope,
      window: counter.kind,
      reason,
      remainingCost: remaining.cost,
      remainingRequests: remaining.requests,
    });
    return { granted: false, scope: counter.scope, kind: counter.kind, reason, remaining };
  }
}

/** The slice of the governor that gated callers depend on. */
export type BudgetGate = Pick<CostGovernor, 'authorize' | 'record' | 'release'>;
