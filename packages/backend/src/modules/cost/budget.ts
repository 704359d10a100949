import type { BudgetPolicy, WindowKind, WindowLimit, WindowLimits } from './cost.types';

/**
 * Start of the UTC window containing `at`. Weeks start on Monday.
 */
export function windowStart(kind: WindowKind, at: Date): Date {
  const year = at.getUTCFullYear();
  const month = at.getUTCMonth();
  const day = at.getUTCDate();

  switch (kind) {
    case 'day':
      return new Date(Date.UTC(year, month, day));
    case 'week': {
      const sinceMonday = (at.getUTCDay() + 6) % 7;
      return new Date(Date.UTC(year, month, day - sinceMonday));
    }
    case 'month':
      return new Date(Date.UTC(year, month, 1));
  }
}

/** Exclusive end of the window that starts at `start`. */
export function windowEnd(kind: WindowKind, start: Date): Date {
  const year = start.getUTCFullYear();
  const month = start.getUTCMonth();
  const day = start.getUTCDate();

  switch (kind) {
    case 'day':
      return new Date(Date.UTC(year, month, day + 1));
    case 'week':
      return new Date(Date.UTC(year, month, day + 7));
    case 'month':
      return new Date(Date.UTC(year, month + 1, 1));
  }
}

/** Costs are tracked to six decimal places, matching the ledger column. */
export function roundCost(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export interface BudgetSettings {
  dailySpend?: number;
  weeklySpend?: number;
  monthlySpend?: number;
  dailyRequests?: number;
  weeklyRequests?: number;
  monthlyRequests?: number;
  providers?: Record<string, WindowLimits>;
}

function limit(maxCost: number | undefined, maxRequests: number | undefined): WindowLimit | undefined {
  if (maxCost === undefined && maxRequests === undefined) return undefined;
  const result: WindowLimit = {};
  if (maxCost !== undefined) result.maxCost = maxCost;
  if (maxRequests !== undefined) result.maxRequests = maxRequests;
  return result;
}

export function buildBudgetPolicy(settings: BudgetSettings): BudgetPolicy {
  const global: WindowLimits = {};
  const day = limit(settings.dailySpend, settings.dailyRequests);
  const week = limit(settings.weeklySpend, settings.weeklyRequests);
  const month = limit(settings.monthlySpend, settings.monthlyRequests);
  if (day) global.day = day;
  if (week) global.week = week;
  if (month) global.month = month;

  return { global, providers: settings.providers ?? {} };
}
