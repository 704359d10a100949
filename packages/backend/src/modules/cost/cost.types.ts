export type WindowKind = 'day' | 'week' | 'month';

export const WINDOW_KINDS: readonly WindowKind[] = ['day', 'week', 'month'];

/** Scope of the budget that applies to every provider. */
export const GLOBAL_SCOPE = '*';

export interface WindowLimit {
  maxCost?: number;
  maxRequests?: number;
}

export type WindowLimits = Partial<Record<WindowKind, WindowLimit>>;

export interface BudgetPolicy {
  global: WindowLimits;
  providers: Record<string, WindowLimits>;
}

export interface CostEvent {
  id: string;
  provider: string;
  endpoint: string;
  cost: number;
  timestamp: Date;
  success: boolean;
  errorMessage: string | null;
}

export type NewCostEvent = Omit<CostEvent, 'id'>;

export interface BudgetWindow {
  scope: string;
  kind: WindowKind;
  windowStart: Date;
  requestCount: number;
  cumulativeCost: number;
  limit: WindowLimit;
  /** null when the window has no cap of that type. */
  remaining: { cost: number | null; requests: number | null };
}

export interface Grant {
  id: string;
  provider: string;
  endpoint: string;
  estimatedCost: number;
  issuedAt: Date;
}

export type DenialReason = 'cost_limit' | 'request_limit';

export type Authorization =
  | { granted: true; grant: Grant }
  | {
      granted: false;
      scope: string;
      kind: WindowKind;
      reason: DenialReason;
      remaining: { cost: number | null; requests: number | null };
    };

export interface CallOutcome {
  success: boolean;
  errorMessage?: string;
}

export interface LedgerRange {
  from: Date;
  to: Date;
}

export interface LedgerReport {
  from: Date;
  to: Date;
  events: CostEvent[];
  totalCost: number;
  windows: BudgetWindow[];
}

export interface SearchCostEstimate {
  pages: number;
  costPerPage: number;
  estimatedCost: number;
}

/** Append-only persistence for cost events. */
export interface CostLedgerStore {
  append(event: NewCostEvent): Promise<CostEvent>;
  listRange(from: Date, to: Date): Promise<CostEvent[]>;
}
