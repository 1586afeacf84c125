import { mkdir } from 'fs/promises';
import { config } from './config.js';
import type { AnalysisStore } from './core/analysisStore.js';
import { FormatAwareAudioDecoder } from './core/audioDecoder.js';
import { AesGcmArtifactCipher, parseEncryptionKey } from './core/encryption.js';
import { JobScheduler } from './core/jobScheduler.js';
import { LeaseTable } from './core/leaseTable.js';
import { MemoryAnalysisStore } from './core/memoryAnalysisStore.js';
import { PgAnalysisStore } from './core/pgAnalysisStore.js';
import { AnalysisPipeline } from './core/pipeline.js';
import { DEFAULT_QUALITY_POLICY } from './core/qualityControl.js';
import { createDatabase } from './db/client.js';
import { initializeSchema } from './db/schema.js';
import { createInferenceBackend } from './providers/inference/index.js';
import { createArtifactStorage } from './providers/storage/index.js';
import type { ArtifactStorage } from './providers/storage/types.js';
import { createJobQueue } from './queue/index.js';
import type { JobQueue } from './queue/types.js';
import type { InferenceBackend } from './types/inference.js';

export interface Runtime {
  store: AnalysisStore;
  storage: ArtifactStorage;
  queue: JobQueue;
  backend: InferenceBackend;
  scheduler: JobScheduler;
  pipeline: AnalysisPipeline;
}

async function createAnalysisStore(): Promise<AnalysisStore> {
  if (config.storeBackend === 'postgres') {
    const db = createDatabase({
      databaseUrl: config.databaseUrl,
      host: config.dbHost,
      port: config.dbPort,
      user: config.dbUser,
      password: config.dbPassword,
      name: config.dbName,
      ssl: config.dbSsl,
    });
    await initializeSchema(db);
    return new PgAnalysisStore(db);
  }
  return new MemoryAnalysisStore();
}

/**
 * Builds every collaborator from `config`. Shared by the API and worker
 * entry points so both see the same store, storage and queue settings.
 */
export async function createRuntime(): Promise<Runtime> {
  if (config.storageBackend === 'local') {
    await mkdir(config.artifactsDir, { recursive: true });
  }

  const store = await createAnalysisStore();
  const storage = createArtifactStorage();
  const queue = createJobQueue();
  const backend = createInferenceBackend();
  const leases = new LeaseTable();

  const scheduler = new JobScheduler({
    store,
    queue,
    leases,
    backend,
    options: {
      maxRetries: config.maxInferenceRetries,
      jobTimeoutMs: config.jobTimeoutMs,
      backoff: { baseDelayMs: config.retryBaseDelayMs, maxDelayMs: config.retryMaxDelayMs },
    },
  });

  const pipeline = new AnalysisPipeline({
    store,
    storage,
    cipher: new AesGcmArtifactCipher(parseEncryptionKey(config.encryptionKey)),
    decoder: new FormatAwareAudioDecoder({
      ffmpegPath: config.ffmpegPath,
      sampleRate: config.decodeSampleRate,
      timeoutMs: config.decodeTimeoutMs,
    }),
    scheduler,
    leases,
    options: {
      maxUploadBytes: config.maxUploadBytes,
      accuracyFloor: config.accuracyFloor,
      quality: {
        ...DEFAULT_QUALITY_POLICY,
        minDurationSeconds: config.minDurationSeconds,
        maxDurationSeconds: config.maxDurationSeconds,
        minSnrDb: config.minSnrDb,
        clipRatioThreshold: config.clipRatioThreshold,
      },
    },
  });

  return { store, storage, queue, backend, scheduler, pipeline };
}
