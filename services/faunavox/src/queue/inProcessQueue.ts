import type { JobHandler, JobQueue } from './types.js';

/**
 * FIFO queue drained by a fixed-size pool of concurrent worker tasks inside
 * this process. Used for single-process deployments and tests.
 */
export class InProcessJobQueue implements JobQueue {
  readonly backend = 'memory';
  private readonly pending: string[] = [];
  private handler: JobHandler | null = null;
  private running = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error('In-process queue concurrency must be a positive integer');
    }
  }

  async enqueue(jobId: string): Promise<void> {
    if (this.closed) {
      throw new Error('In-process job queue is closed');
    }
    this.pending.push(jobId);
    this.pump();
  }

  start(handler: JobHandler): void {
    if (this.handler) {
      throw new Error('In-process job queue already started');
    }
    this.handler = handler;
    this.pump();
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  /** Resolves once nothing is pending and no worker task is running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  get depth(): number {
    return this.pending.length;
  }

  get active(): number {
    return this.running;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.pending.length = 0;
    await this.onIdle();
  }

  private isIdle(): boolean {
    return this.running === 0 && (this.pending.length === 0 || !this.handler);
  }

  private pump(): void {
    const handler = this.handler;
    if (!handler) return;

    while (this.running < this.concurrency && this.pending.length > 0) {
      const jobId = this.pending.shift();
      if (jobId === undefined) break;
      this.running += 1;
      void this.runTask(handler, jobId);
    }
    this.notifyIdle();
  }

  private async runTask(handler: JobHandler, jobId: string): Promise<void> {
    try {
      await handler(jobId);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown worker error';
      console.error(`[faunavox-worker] failed job_id=${jobId} error=${message}`);
    } finally {
      this.running -= 1;
      this.pump();
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
