import { config } from './config.js';
import { createRuntime } from './runtime.js';

async function main() {
  if (config.queueBackend !== 'redis') {
    throw new Error('worker.ts consumes the Redis queue; with QUEUE_BACKEND=memory the API process runs jobs itself');
  }

  const { pipeline, queue, store, backend } = await createRuntime();
  queue.start((jobId) => pipeline.processJob(jobId));
  console.log(
    `[faunavox-worker] started inference=${backend.name} store=${store.name} concurrency=${config.maxConcurrentJobs}`,
  );

  const shutdown = () => {
    Promise.all([queue.close(), store.close()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[faunavox-worker] shutdown failed', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[faunavox-worker] fatal startup error', error);
  process.exit(1);
});
