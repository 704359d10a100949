import { Request, Response, NextFunction } from 'express';
import { successResponse } from '../../shared/envelope';
import { ValidationError } from '../../shared/errors';
import { parseBatchCsv } from './batch-input';
import type { JobOrchestrator } from './job-orchestrator';
import { batchParamsSchema, createJobBodySchema, jobParamsSchema, paginationQuerySchema } from './job.schemas';

export function createJobController(orchestrator: JobOrchestrator) {
  return {
    async createJob(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body = createJobBodySchema.parse(req.body);
        const job = await orchestrator.submitSearch(body);
        orchestrator.start(job.id);
        res.status(202).json(successResponse(job));
      } catch (err) {
        next(err);
      }
    },

    async getJob(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { jobId } = jobParamsSchema.parse(req.params);
        const job = await orchestrator.getJob(jobId);
        res.status(200).json(successResponse(job));
      } catch (err) {
        next(err);
      }
    },

    async listResults(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { jobId } = jobParamsSchema.parse(req.params);
        const { page, limit } = paginationQuerySchema.parse(req.query);
        const { items, total } = await orchestrator.listResults(jobId, { page, limit });
        res.status(200).json(successResponse(items, { page, limit, total }));
      } catch (err) {
        next(err);
      }
    },

    async cancelJob(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { jobId } = jobParamsSchema.parse(req.params);
        const job = await orchestrator.cancel(jobId);
        res.status(202).json(successResponse(job));
      } catch (err) {
        next(err);
      }
    },

    async resumeJob(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { jobId } = jobParamsSchema.parse(req.params);
        const job = await orchestrator.resume(jobId);
        orchestrator.startResumed(job);
        res.status(202).json(successResponse(job));
      } catch (err) {
        next(err);
      }
    },

    async createBatch(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const file = req.file;
        if (!file) {
          throw new ValidationError('No file uploaded');
        }
        const { rows, skipped } = parseBatchCsv(file.buffer.toString('utf-8'));
        const batch = await orchestrator.submitBatch(rows);
        orchestrator.startBatch(batch.batchId);
        res.status(202).json(successResponse({ ...batch, skippedRows: skipped }));
      } catch (err) {
        next(err);
      }
    },

    async resumeBatch(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { batchId } = batchParamsSchema.parse(req.params);
        const progress = await orchestrator.resumeBatch(batchId);
        orchestrator.startBatch(batchId);
        res.status(202).json(successResponse(progress));
      } catch (err) {
        next(err);
      }
    },

    async getBatch(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { batchId } = batchParamsSchema.parse(req.params);
        const progress = await orchestrator.getBatchProgress(batchId);
        res.status(200).json(successResponse(progress));
      } catch (err) {
        next(err);
      }
    },
  };
}
