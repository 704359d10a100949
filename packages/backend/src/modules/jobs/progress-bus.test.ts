import { describe, it, expect } from 'vitest';
import type { ProgressEvent } from './job.types';
import { ProgressBus } from './progress-bus';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const event: ProgressEvent = {
  jobId: 'job-1',
  batchId: null,
  progressPercent: 40,
  status: 'running',
  detailMessage: 'Processed Business 4',
  timestamp: new Date('2026-10-21T12:00:00.000Z'),
};

describe('ProgressBus', () => {
  it('delivers events after publish returns', async () => {
    const bus = new ProgressBus();
    const received: ProgressEvent[] = [];
    bus.subscribe((e) => {
      received.push(e);
    });

    bus.publish(event);
    expect(received).toEqual([]);

    await flush();
    expect(received).toEqual([event]);
  });

  it('keeps delivering to other listeners when one throws', async () => {
    const bus = new ProgressBus();
    const received: string[] = [];
    bus.subscribe(() => {
      throw new Error('listener broke');
    });
    bus.subscribe(async (e) => {
      received.push(e.jobId);
    });

    bus.publish(event);
    await flush();

    expect(received).toEqual(['job-1']);
  });

  it('stops delivering after unsubscribe', async () => {
    const bus = new ProgressBus();
    const received: ProgressEvent[] = [];
    const unsubscribe = bus.subscribe((e) => {
      received.push(e);
    });

    unsubscribe();
    bus.publish(event);
    await flush();

    expect(received).toEqual([]);
    expect(bus.listenerCount).toBe(0);
  });
});
