import type { PlaceIndexStore } from '../../src/modules/dedup/dedup.types';

export class InMemoryPlaceIndex implements PlaceIndexStore {
  readonly entries = new Map<string, { jobId: string; processed: boolean }>();

  async tryAdmit(placeId: string, jobId: string): Promise<boolean> {
    if (this.entries.has(placeId)) return false;
    this.entries.set(placeId, { jobId, processed: false });
    return true;
  }

  async markProcessed(placeId: string): Promise<void> {
    const entry = this.entries.get(placeId);
    if (entry) entry.processed = true;
  }

  async findPending(jobId: string): Promise<string[]> {
    return [...this.entries]
      .filter(([, entry]) => entry.jobId === jobId && !entry.processed)
      .map(([placeId]) => placeId);
  }
}
