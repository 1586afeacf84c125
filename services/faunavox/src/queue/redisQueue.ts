import { Queue, Worker } from 'bullmq';
import { createRedisConnectionOptions } from './connection.js';
import { ANALYSIS_QUEUE_NAME, type AnalysisQueuePayload } from './constants.js';
import type { JobHandler, JobQueue } from './types.js';

export class RedisJobQueue implements JobQueue {
  readonly backend = 'redis';
  private readonly queue: Queue<AnalysisQueuePayload, void, string>;
  private worker: Worker<AnalysisQueuePayload, void, string> | null = null;

  constructor(
    private readonly redisUrl: string,
    private readonly concurrency: number,
  ) {
    this.queue = new Queue<AnalysisQueuePayload, void, string>(ANALYSIS_QUEUE_NAME, {
      connection: createRedisConnectionOptions(redisUrl, 'api'),
      defaultJobOptions: {
        // retries happen inside the job against the attempt counter, not in BullMQ
        attempts: 1,
        removeOnComplete: { age: 3600, count: 2000 },
        removeOnFail: { age: 24 * 3600, count: 5000 },
      },
    });
  }

  async enqueue(jobId: string): Promise<void> {
    await this.queue.add(jobId, { jobId }, { jobId });
  }

  start(handler: JobHandler): void {
    if (this.worker) {
      throw new Error('Redis job queue worker already started');
    }
    this.worker = new Worker<AnalysisQueuePayload, void, string>(
      ANALYSIS_QUEUE_NAME,
      async (job) => {
        await handler(job.data.jobId);
      },
      {
        connection: createRedisConnectionOptions(this.redisUrl, 'worker'),
        concurrency: this.concurrency,
      },
    );

    this.worker.on('ready', () => {
      console.log(
        `[faunavox-worker] ready queue=${ANALYSIS_QUEUE_NAME} concurrency=${this.concurrency}`,
      );
    });
    this.worker.on('failed', (job, error) => {
      console.error(
        `[faunavox-worker] failed job_id=${job?.data?.jobId || 'unknown'} error=${error.message}`,
      );
    });
  }

  async ping(): Promise<string> {
    const client = await this.queue.client;
    return client.ping();
  }

  async close(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
    }
    await this.queue.close();
  }
}
