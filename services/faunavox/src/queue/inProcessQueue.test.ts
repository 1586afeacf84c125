import { describe, expect, it, vi } from 'vitest';
import { InProcessJobQueue } from './inProcessQueue.js';

describe('InProcessJobQueue', () => {
  it('holds jobs until a handler starts', async () => {
    const queue = new InProcessJobQueue(1);
    await queue.enqueue('job-1');
    await queue.enqueue('job-2');
    expect(queue.depth).toBe(2);

    const seen: string[] = [];
    queue.start(async (jobId) => {
      seen.push(jobId);
    });
    await queue.onIdle();

    expect(seen).toEqual(['job-1', 'job-2']);
    expect(queue.depth).toBe(0);
  });

  it('never runs more tasks than its concurrency', async () => {
    const queue = new InProcessJobQueue(2);
    let running = 0;
    let peak = 0;
    queue.start(async () => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running -= 1;
    });

    await Promise.all(['a', 'b', 'c', 'd', 'e'].map((jobId) => queue.enqueue(jobId)));
    await queue.onIdle();

    expect(peak).toBe(2);
  });

  it('keeps draining after a handler throws', async () => {
    const queue = new InProcessJobQueue(1);
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const handler = vi.fn(async (jobId: string) => {
      if (jobId === 'bad') throw new Error('boom');
    });
    queue.start(handler);

    await queue.enqueue('bad');
    await queue.enqueue('good');
    await queue.onIdle();

    expect(handler).toHaveBeenCalledTimes(2);
    expect(errorLog).toHaveBeenCalledWith('[faunavox-worker] failed job_id=bad error=boom');
    errorLog.mockRestore();
  });

  it('refuses work after close', async () => {
    const queue = new InProcessJobQueue(1);
    await queue.close();

    await expect(queue.enqueue('job-1')).rejects.toThrow('In-process job queue is closed');
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => new InProcessJobQueue(0)).toThrow('In-process queue concurrency must be a positive integer');
  });
});
