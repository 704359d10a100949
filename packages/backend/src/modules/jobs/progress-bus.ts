import { EventEmitter } from 'events';
import { describeError, logger } from '../../shared/logger';
import type { ProgressEvent } from './job.types';

export type ProgressListener = (event: ProgressEvent) => void | Promise<void>;

const PROGRESS = 'progress';

/**
 * Fan-out of job progress. `publish` returns immediately; listeners run on a
 * later tick and their failures are logged, never surfaced to the publisher.
 */
export class ProgressBus {
  private readonly emitter = new EventEmitter();

  subscribe(listener: ProgressListener): () => void {
    const handler = (event: ProgressEvent): void => {
      Promise.resolve()
        .then(() => listener(event))
        .catch((err: unknown) => {
          logger.warn('Progress listener failed', { jobId: event.jobId, error: describeError(err) });
        });
    };
    this.emitter.on(PROGRESS, handler);
    return () => {
      this.emitter.off(PROGRESS, handler);
    };
  }

  publish(event: ProgressEvent): void {
    setImmediate(() => {
      this.emitter.emit(PROGRESS, event);
    });
  }

  get listenerCount(): number {
    return this.emitter.listenerCount(PROGRESS);
  }
}
