import { logger } from '../../shared/logger';
import type { Admission, PlaceIndexStore } from './dedup.types';

/**
 * Identity resolution by provider place id, persisted across runs. The
 * first job to admit an id owns it; later sightings are duplicates.
 */
export class Deduplicator {
  constructor(private readonly store: PlaceIndexStore) {}

  async admit(placeId: string, jobId: string): Promise<Admission> {
    const admitted = await this.store.tryAdmit(placeId, jobId);
    if (!admitted) {
      logger.debug('Duplicate listing rejected', { placeId, jobId });
      return 'duplicate';
    }
    return 'admitted';
  }

  markProcessed(placeId: string): Promise<void> {
    return this.store.markProcessed(placeId);
  }

  /** Place ids this job admitted but never finished processing. */
  pendingFor(jobId: string): Promise<string[]> {
    return this.store.findPending(jobId);
  }
}
