import { Request, Response, NextFunction } from 'express';
import { successResponse } from '../../shared/envelope';
import { roundCost } from './budget';
import type { CostGovernor } from './cost-governor';
import { estimateQuerySchema, ledgerQuerySchema } from './cost.schemas';

export interface CostControllerDeps {
  governor: Pick<CostGovernor, 'getWindows' | 'getLedgerReport' | 'estimateSearchCost'>;
  /** Worst-case enrichment cost for `records` businesses under the active waterfall. */
  estimateEnrichmentCost(records: number): number;
}

export function createCostController(deps: CostControllerDeps) {
  return {
    async getWindows(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        res.status(200).json(successResponse(deps.governor.getWindows()));
      } catch (err) {
        next(err);
      }
    },

    async getLedger(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { from, to } = ledgerQuerySchema.parse(req.query);
        const report = await deps.governor.getLedgerReport({ from, to });
        res.status(200).json(successResponse(report, { events: report.events.length }));
      } catch (err) {
        next(err);
      }
    },

    async getEstimate(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { maxResults } = estimateQuerySchema.parse(req.query);
        const search = deps.governor.estimateSearchCost(maxResults);
        const enrichmentCost = deps.estimateEnrichmentCost(maxResults);
        res.status(200).json(
          successResponse({
            maxResults,
            search,
            enrichmentCost,
            totalCost: roundCost(search.estimatedCost + enrichmentCost),
          }),
        );
      } catch (err) {
        next(err);
      }
    },
  };
}
