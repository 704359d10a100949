import { Router } from 'express';
import multer from 'multer';
import { validate } from '../../middleware/validate';
import { createJobController } from './job.controller';
import type { JobOrchestrator } from './job-orchestrator';
import { batchParamsSchema, createJobBodySchema, jobParamsSchema, paginationQuerySchema } from './job.schemas';

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 2 * 1024 * 1024 } }); // 2MB max

export function createJobRoutes(orchestrator: JobOrchestrator): { jobRoutes: Router; batchRoutes: Router } {
  const controller = createJobController(orchestrator);

  // --- Job routes: /api/v1/jobs ---
  const jobRoutes = Router();

  // POST /api/v1/jobs
  jobRoutes.post('/', validate({ body: createJobBodySchema }), controller.createJob);

  // GET /api/v1/jobs/:jobId
  jobRoutes.get('/:jobId', validate({ params: jobParamsSchema }), controller.getJob);

  // GET /api/v1/jobs/:jobId/results
  jobRoutes.get(
    '/:jobId/results',
    validate({ params: jobParamsSchema, query: paginationQuerySchema }),
    controller.listResults,
  );

  // POST /api/v1/jobs/:jobId/cancel
  jobRoutes.post('/:jobId/cancel', validate({ params: jobParamsSchema }), controller.cancelJob);

  // POST /api/v1/jobs/:jobId/resume
  jobRoutes.post('/:jobId/resume', validate({ params: jobParamsSchema }), controller.resumeJob);

  // --- Batch routes: /api/v1/batches ---
  const batchRoutes = Router();

  // POST /api/v1/batches (multipart field "file")
  batchRoutes.post('/', upload.single('file'), controller.createBatch);

  // GET /api/v1/batches/:batchId
  batchRoutes.get('/:batchId', validate({ params: batchParamsSchema }), controller.getBatch);

  // POST /api/v1/batches/:batchId/resume
  batchRoutes.post('/:batchId/resume', validate({ params: batchParamsSchema }), controller.resumeBatch);

  return { jobRoutes, batchRoutes };
}
