import { config } from './config.js';
import { createApp } from './app.js';
import { createRuntime } from './runtime.js';

async function main() {
  const runtime = await createRuntime();
  const { pipeline, queue, store, storage, backend } = runtime;

  // the in-process queue has no separate worker process
  if (queue.backend === 'memory') {
    queue.start((jobId) => pipeline.processJob(jobId));
  }

  const app = createApp(
    {
      pipeline,
      store,
      storage,
      queue,
      backend,
      settings: {
        publicBaseUrl: config.publicBaseUrl,
        gatewayKeyRequired: Boolean(config.masterApiKey),
        maxUploadBytes: config.maxUploadBytes,
      },
    },
    config.masterApiKey,
  );

  const server = app.listen(config.port, () => {
    console.log(`[faunavox] listening on ${config.publicBaseUrl}`);
    console.log(`[faunavox] inference=${backend.name} store=${store.name} queue=${queue.backend}`);
    console.log(`[faunavox] worker_mode=${queue.backend === 'memory' ? 'in-process' : 'external'}`);
    if (config.storageBackend === 'local') {
      console.log(`[faunavox] artifacts_dir=${config.artifactsDir}`);
    } else if (config.storageBackend === 's3') {
      console.log(`[faunavox] artifacts_bucket=${config.s3Bucket} endpoint=${config.s3Endpoint}`);
    } else {
      console.log('[faunavox] artifacts=memory');
    }
  });

  const shutdown = () => {
    server.close(() => {
      Promise.all([queue.close(), store.close()])
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('[faunavox] shutdown failed', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[faunavox] fatal startup error', error);
  process.exit(1);
});
