import { ConflictError } from '../../shared/errors';
import type { SearchCheckpoint } from '../search/search.types';

export type JobKind = 'single' | 'batch';

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export interface Job {
  id: string;
  kind: JobKind;
  batchId: string | null;
  query: string;
  location: string | null;
  maxResults: number;
  status: JobStatus;
  totalRecords: number;
  processedRecords: number;
  enrichedRecords: number;
  failedRecords: number;
  errorMessage: string | null;
  lastCheckpoint: SearchCheckpoint | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface SearchRequest {
  query: string;
  location: string | null;
  maxResults: number;
}

export interface NewJob extends SearchRequest {
  kind: JobKind;
  batchId: string | null;
}

export type JobUpdate = Partial<
  Pick<
    Job,
    | 'status'
    | 'totalRecords'
    | 'processedRecords'
    | 'enrichedRecords'
    | 'failedRecords'
    | 'errorMessage'
    | 'lastCheckpoint'
  >
>;

export interface JobStore {
  create(job: NewJob): Promise<Job>;
  findById(jobId: string): Promise<Job | null>;
  /** Returns null when the job does not exist. */
  update(jobId: string, changes: JobUpdate): Promise<Job | null>;
  /** Jobs of a batch in submission order. */
  listByBatch(batchId: string): Promise<Job[]>;
}

export type BatchStatus = 'queued' | 'running' | 'completed';

export interface BatchProgress {
  batchId: string;
  status: BatchStatus;
  totalJobs: number;
  queuedJobs: number;
  runningJobs: number;
  completedJobs: number;
  failedJobs: number;
  cancelledJobs: number;
  totalRecords: number;
  processedRecords: number;
  progressPercent: number;
  jobs: Job[];
}

export interface ProgressEvent {
  jobId: string;
  batchId: string | null;
  progressPercent: number;
  status: JobStatus;
  detailMessage: string;
  timestamp: Date;
}

// `running -> queued` is the resume path for a job whose process died.
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['running', 'cancelled'],
  running: ['completed', 'failed', 'cancelled', 'queued'],
  completed: [],
  failed: ['queued'],
  cancelled: ['queued'],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(job: Pick<Job, 'id' | 'status'>, to: JobStatus): void {
  if (!canTransition(job.status, to)) {
    throw new ConflictError(`Job ${job.id} cannot move from ${job.status} to ${to}`);
  }
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Share of the requested results already processed. Only a completed job
 * reports 100.
 */
export function progressPercent(job: Pick<Job, 'status' | 'processedRecords' | 'totalRecords' | 'maxResults'>): number {
  if (job.status === 'completed') return 100;
  const denominator = Math.max(job.totalRecords, job.maxResults, 1);
  return Math.min(99, Math.floor((job.processedRecords * 100) / denominator));
}
