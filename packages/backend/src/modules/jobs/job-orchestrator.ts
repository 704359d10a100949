import { v4 as uuidv4 } from 'uuid';
import { WorkerPool } from '../../shared/async';
import { AuthError, BudgetExhaustedError, ConflictError, NotFoundError, ValidationError } from '../../shared/errors';
import { describeError, logger } from '../../shared/logger';
import type { Deduplicator } from '../dedup/deduplicator';
import type { EnrichOptions } from '../enrichment/waterfall';
import type { EnrichmentResult, JobOutputReader, OutputRecord, PageOptions, PaginatedResult } from '../enrichment/enrichment.types';
import type { SearchProvider } from '../search/search-provider';
import type { BusinessRecord, BusinessStore, SearchSummary } from '../search/search.types';
import {
  assertTransition,
  isTerminal,
  progressPercent,
  type BatchProgress,
  type BatchStatus,
  type Job,
  type JobStatus,
  type JobStore,
  type JobUpdate,
  type SearchRequest,
} from './job.types';
import type { ProgressBus } from './progress-bus';

export interface Enricher {
  enrich(business: BusinessRecord, options?: EnrichOptions): Promise<EnrichmentResult | null>;
}

export interface JobOrchestratorConfig {
  jobs: JobStore;
  businesses: BusinessStore;
  dedup: Deduplicator;
  search: Pick<SearchProvider, 'search'>;
  waterfall: Enricher;
  output: JobOutputReader;
  progress: ProgressBus;
  concurrency: number;
  /** Fail the job when a search page is denied by the budget. */
  strictBudget: boolean;
  clock?: () => Date;
}

export interface BatchSubmission {
  batchId: string;
  jobs: Job[];
}

/** Mutable state of one in-process run. */
interface RunContext {
  job: Job;
  cancelled: boolean;
  totalRecords: number;
  processedRecords: number;
  enrichedRecords: number;
  failedRecords: number;
  /** Place ids handed to the pool in this run; a repeated listing is skipped. */
  admitted: Set<string>;
}

/** A batch loop in this process; `rerun` asks it to look for queued jobs once more. */
interface BatchLoop {
  rerun: boolean;
  done: Promise<BatchProgress> | null;
}

/**
 * Sequences search, deduplication and enrichment for a job.
 *
 * Pages are pulled one at a time; every admitted record goes to a bounded
 * worker pool running the waterfall. Checkpoints are saved after each page
 * and counters after each record, so `resume` can finish what an earlier
 * run admitted and then continue the search where it stopped.
 */
export class JobOrchestrator {
  private readonly active = new Map<string, RunContext>();
  private readonly background = new Map<string, Promise<unknown>>();
  private readonly batchLoops = new Map<string, BatchLoop>();
  private readonly clock: () => Date;
  private stopping = false;

  constructor(private readonly config: JobOrchestratorConfig) {
    this.clock = config.clock ?? (() => new Date());
  }

  async submitSearch(request: SearchRequest): Promise<Job> {
    const job = await this.config.jobs.create({ ...request, kind: 'single', batchId: null });
    logger.info('Search job submitted', { jobId: job.id, query: job.query, location: job.location });
    this.publish(job, 'Job queued');
    return job;
  }

  /** Creates one queued job per row under a fresh batch id. */
  async submitBatch(rows: SearchRequest[]): Promise<BatchSubmission> {
    if (rows.length === 0) throw new ValidationError('A batch needs at least one row');
    const batchId = uuidv4();
    const jobs: Job[] = [];
    for (const row of rows) {
      const job = await this.config.jobs.create({ ...row, kind: 'batch', batchId });
      jobs.push(job);
      this.publish(job, 'Job queued');
    }
    logger.info('Batch submitted', { batchId, jobs: jobs.length });
    return { batchId, jobs };
  }

  async getJob(jobId: string): Promise<Job> {
    const job = await this.config.jobs.findById(jobId);
    if (!job) throw new NotFoundError(`Job ${jobId} not found`);
    return job;
  }

  async getBatchProgress(batchId: string): Promise<BatchProgress> {
    const jobs = await this.config.jobs.listByBatch(batchId);
    if (jobs.length === 0) throw new NotFoundError(`Batch ${batchId} not found`);

    const count = (status: JobStatus) => jobs.filter((j) => j.status === status).length;
    const queuedJobs = count('queued');
    const runningJobs = count('running');
    let status: BatchStatus = 'running';
    if (queuedJobs === jobs.length) status = 'queued';
    else if (jobs.every((j) => isTerminal(j.status))) status = 'completed';

    const finished = jobs.length - queuedJobs - runningJobs;
    const partial = jobs
      .filter((j) => j.status === 'running')
      .reduce((sum, j) => sum + progressPercent(j) / 100, 0);

    return {
      batchId,
      status,
      totalJobs: jobs.length,
      queuedJobs,
      runningJobs,
      completedJobs: count('completed'),
      failedJobs: count('failed'),
      cancelledJobs: count('cancelled'),
      totalRecords: jobs.reduce((sum, j) => sum + j.totalRecords, 0),
      processedRecords: jobs.reduce((sum, j) => sum + j.processedRecords, 0),
      progressPercent: status === 'completed' ? 100 : Math.floor(((finished + partial) * 100) / jobs.length),
      jobs,
    };
  }

  async listResults(jobId: string, options: PageOptions): Promise<PaginatedResult<OutputRecord>> {
    await this.getJob(jobId);
    return this.config.output.listOutputForJob(jobId, options);
  }

  /**
   * Requests cancellation. A job running here stops at the next record
   * boundary; a queued job, or one left running by a dead process, is
   * cancelled directly.
   */
  async cancel(jobId: string): Promise<Job> {
    const job = await this.getJob(jobId);
    const ctx = this.active.get(jobId);
    if (ctx) {
      ctx.cancelled = true;
      logger.info('Job cancellation requested', { jobId });
      return job;
    }
    return this.transition(job, 'cancelled', { errorMessage: null });
  }

  /**
   * Re-queues a cancelled, failed or orphaned running job. A job that is
   * already queued but has no runner here (a batch cut short by a dead
   * process) is returned as it is, ready to be started again.
   */
  async resume(jobId: string): Promise<Job> {
    const job = await this.getJob(jobId);
    if (this.active.has(jobId)) {
      throw new ConflictError(`Job ${jobId} is already running`);
    }
    if (job.status === 'queued') {
      logger.info('Job already queued, restarting it', { jobId, batchId: job.batchId });
      return job;
    }
    const updated = await this.transition(job, 'queued', { errorMessage: null });
    logger.info('Job re-queued', { jobId, from: job.status, checkpoint: job.lastCheckpoint });
    return updated;
  }

  /** Re-queues every unfinished job of a batch that has no runner here. */
  async resumeBatch(batchId: string): Promise<BatchProgress> {
    const jobs = await this.config.jobs.listByBatch(batchId);
    if (jobs.length === 0) throw new NotFoundError(`Batch ${batchId} not found`);

    let requeued = 0;
    for (const job of jobs) {
      if (this.active.has(job.id) || job.status === 'completed' || job.status === 'queued') continue;
      await this.transition(job, 'queued', { errorMessage: null });
      requeued += 1;
    }
    logger.info('Batch re-queued', { batchId, requeued });
    return this.getBatchProgress(batchId);
  }

  /** Runs a queued job in the background; failures are logged. */
  start(jobId: string): void {
    if (this.background.has(jobId)) return;
    this.track(jobId, this.run(jobId));
  }

  /** Runs the queued jobs of a batch one after another in the background. */
  startBatch(batchId: string): void {
    const existing = this.batchLoops.get(batchId);
    if (existing) {
      existing.rerun = true;
      return;
    }
    this.track(`batch:${batchId}`, this.runBatch(batchId));
  }

  /** Starts a re-queued job through its batch when it belongs to one. */
  startResumed(job: Job): void {
    if (job.batchId) this.startBatch(job.batchId);
    else this.start(job.id);
  }

  /** Resolves once every background run started here has settled. */
  async idle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.allSettled([...this.background.values()]);
    }
  }

  /** Requests cancellation of every run in this process and waits for them. */
  async shutdown(): Promise<void> {
    this.stopping = true;
    for (const ctx of this.active.values()) ctx.cancelled = true;
    await this.idle();
  }

  /**
   * Runs the batch's queued jobs in creation order until none is left. One
   * loop per batch: a second call while it runs makes it look again for jobs
   * queued in the meantime and shares its outcome.
   */
  async runBatch(batchId: string): Promise<BatchProgress> {
    const existing = this.batchLoops.get(batchId);
    if (existing) {
      existing.rerun = true;
      return existing.done ?? this.getBatchProgress(batchId);
    }
    const loop: BatchLoop = { rerun: false, done: null };
    this.batchLoops.set(batchId, loop);
    loop.done = this.driveBatch(batchId, loop);
    return loop.done;
  }

  private async driveBatch(batchId: string, loop: BatchLoop): Promise<BatchProgress> {
    try {
      for (;;) {
        if (this.stopping) break;
        loop.rerun = false;
        // Re-listed every round: jobs may be cancelled or re-queued meanwhile
        const jobs = await this.config.jobs.listByBatch(batchId);
        const next = jobs.find((j) => j.status === 'queued' && !this.active.has(j.id));
        if (!next) {
          if (loop.rerun) continue;
          break;
        }
        await this.run(next.id);
      }
    } finally {
      this.batchLoops.delete(batchId);
    }
    return this.getBatchProgress(batchId);
  }

  /**
   * Runs a queued job to a terminal state and returns it. Provider auth
   * failures and, in strict mode, a denied search page fail the job; other
   * per-record problems are counted and the job carries on.
   */
  async run(jobId: string): Promise<Job> {
    const queued = await this.getJob(jobId);
    if (this.active.has(jobId)) throw new ConflictError(`Job ${jobId} is already running`);

    // Claimed before the first await so a concurrent caller sees it as running
    const ctx: RunContext = {
      job: queued,
      cancelled: false,
      totalRecords: queued.totalRecords,
      processedRecords: queued.processedRecords,
      enrichedRecords: queued.enrichedRecords,
      failedRecords: queued.failedRecords,
      admitted: new Set<string>(),
    };
    this.active.set(jobId, ctx);
    let job: Job;
    try {
      job = await this.transition(queued, 'running', { errorMessage: null });
    } catch (err) {
      this.active.delete(jobId);
      throw err;
    }
    ctx.job = job;
    logger.info('Job started', { jobId, query: job.query, location: job.location, maxResults: job.maxResults });

    const pool = new WorkerPool(this.config.concurrency);
    try {
      await this.drainPending(ctx, pool);
      const summary = ctx.cancelled ? null : await this.searchAndEnqueue(ctx, pool);
      await pool.drain();

      if (ctx.cancelled) {
        return await this.finish(ctx, 'cancelled', 'Job cancelled');
      }
      if (summary && summary.stopReason === 'budget_denied' && this.config.strictBudget) {
        throw new BudgetExhaustedError(`Search budget exhausted after ${summary.pagesFetched} page(s)`);
      }
      if (summary && summary.stopReason === 'budget_denied') {
        logger.warn('Search stopped by budget', { jobId, pagesFetched: summary.pagesFetched });
      }
      const detail = summary ? `Search stopped: ${summary.stopReason}` : 'Job completed';
      return await this.finish(ctx, 'completed', detail);
    } catch (err) {
      // Let in-flight records settle before recording the failure
      ctx.cancelled = true;
      await pool.drain().catch((drainErr: unknown) => {
        logger.error('Enrichment task failed during shutdown', { jobId, error: describeError(drainErr) });
      });
      if (err instanceof AuthError || err instanceof BudgetExhaustedError) {
        logger.warn('Job failed', { jobId, error: err.message });
      } else {
        logger.error('Job failed unexpectedly', { jobId, error: describeError(err) });
      }
      const message = err instanceof Error ? err.message : String(err);
      return await this.finish(ctx, 'failed', message, message);
    } finally {
      this.active.delete(jobId);
    }
  }

  /** Re-enqueues records this job admitted in an earlier run but never processed. */
  private async drainPending(ctx: RunContext, pool: WorkerPool): Promise<void> {
    const pending = await this.config.dedup.pendingFor(ctx.job.id);
    if (pending.length === 0) return;
    logger.info('Resuming pending records', { jobId: ctx.job.id, pending: pending.length });

    const records = await this.config.businesses.findByPlaceIds(pending);
    for (const record of records) {
      if (ctx.cancelled) return;
      ctx.admitted.add(record.placeId);
      await pool.submit(() => this.processRecord(ctx, record));
    }
    // Must settle first: a re-read page would otherwise admit them again
    await pool.drain();
  }

  private async searchAndEnqueue(ctx: RunContext, pool: WorkerPool): Promise<SearchSummary | null> {
    const { job } = ctx;
    const { businesses, dedup, jobs } = this.config;

    const pages = this.config.search.search(job.query, job.location, job.maxResults, {
      jobId: job.id,
      startAt: job.lastCheckpoint ?? undefined,
      onPage: async (checkpoint) => {
        await jobs.update(job.id, { lastCheckpoint: checkpoint, totalRecords: ctx.totalRecords });
      },
    });

    for (;;) {
      if (ctx.cancelled) return null;
      const step = await pages.next();
      if (step.done) return step.value;

      const record = step.value;
      if (ctx.admitted.has(record.placeId)) {
        logger.debug('Repeated listing skipped', { jobId: job.id, placeId: record.placeId });
        continue;
      }
      await businesses.upsert(record);
      const admission = await dedup.admit(record.placeId, job.id);
      if (admission === 'duplicate') continue;

      ctx.admitted.add(record.placeId);
      ctx.totalRecords += 1;
      await pool.submit(() => this.processRecord(ctx, record));
    }
  }

  private async processRecord(ctx: RunContext, record: BusinessRecord): Promise<void> {
    if (ctx.cancelled) return;
    const jobId = ctx.job.id;

    let failed: boolean;
    try {
      const result = await this.config.waterfall.enrich(record, { isCancelled: () => ctx.cancelled });
      // Cancelled mid-waterfall: stays pending for a later resume
      if (result === null) return;
      failed = result.enrichmentFailed;
    } catch (err) {
      logger.error('Enrichment failed for business', {
        jobId,
        placeId: record.placeId,
        error: describeError(err),
      });
      failed = true;
    }

    await this.config.dedup.markProcessed(record.placeId);
    ctx.processedRecords += 1;
    if (failed) ctx.failedRecords += 1;
    else ctx.enrichedRecords += 1;

    const updated = await this.config.jobs.update(jobId, this.counters(ctx));
    if (updated) {
      ctx.job = updated;
      this.publish(updated, `Processed ${record.name}`);
    }
  }

  private counters(ctx: RunContext): JobUpdate {
    return {
      totalRecords: ctx.totalRecords,
      processedRecords: ctx.processedRecords,
      enrichedRecords: ctx.enrichedRecords,
      failedRecords: ctx.failedRecords,
    };
  }

  private async finish(ctx: RunContext, status: JobStatus, detail: string, errorMessage: string | null = null): Promise<Job> {
    const job = await this.transition(ctx.job, status, { ...this.counters(ctx), errorMessage }, detail);
    logger.info('Job finished', {
      jobId: job.id,
      status,
      totalRecords: job.totalRecords,
      processedRecords: job.processedRecords,
      enrichedRecords: job.enrichedRecords,
      failedRecords: job.failedRecords,
    });
    return job;
  }

  private async transition(job: Job, to: JobStatus, changes: JobUpdate = {}, detail?: string): Promise<Job> {
    assertTransition(job, to);
    const updated = await this.config.jobs.update(job.id, { ...changes, status: to });
    if (!updated) throw new NotFoundError(`Job ${job.id} not found`);
    this.publish(updated, detail ?? `Job ${to}`);
    return updated;
  }

  private publish(job: Job, detailMessage: string): void {
    this.config.progress.publish({
      jobId: job.id,
      batchId: job.batchId,
      progressPercent: progressPercent(job),
      status: job.status,
      detailMessage,
      timestamp: this.clock(),
    });
  }

  private track(key: string, work: Promise<unknown>): void {
    const tracked = work
      .catch((err: unknown) => {
        logger.error('Background run failed', { key, error: describeError(err) });
      })
      .finally(() => {
        this.background.delete(key);
      });
    this.background.set(key, tracked);
  }
}
