import { Router } from 'express';
import { validate } from '../../middleware/validate';
import { createCostController, type CostControllerDeps } from './cost.controller';
import { estimateQuerySchema, ledgerQuerySchema } from './cost.schemas';

export function createCostRoutes(deps: CostControllerDeps): Router {
  const router = Router();
  const controller = createCostController(deps);

  // GET /api/v1/costs/windows
  router.get('/windows', controller.getWindows);

  // GET /api/v1/costs/ledger?from=...&to=...
  router.get('/ledger', validate({ query: ledgerQuerySchema }), controller.getLedger);

  // GET /api/v1/costs/estimate?maxResults=...
  router.get('/estimate', validate({ query: estimateQuerySchema }), controller.getEstimate);

  return router;
}
