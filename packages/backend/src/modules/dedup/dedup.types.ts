export type Admission = 'admitted' | 'duplicate';

/** Persisted set of known place ids with the job that admitted each. */
export interface PlaceIndexStore {
  /**
   * Atomically inserts `placeId` for `jobId`. Returns true only when the id
   * was new. Unprocessed ids of an interrupted job come back through
   * `findPending`, never through a second admission.
   */
  tryAdmit(placeId: string, jobId: string): Promise<boolean>;
  markProcessed(placeId: string): Promise<void>;
  findPending(jobId: string): Promise<string[]>;
}
