import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from './app.js';
import { FormatAwareAudioDecoder } from './core/audioDecoder.js';
import { AesGcmArtifactCipher } from './core/encryption.js';
import { JobScheduler } from './core/jobScheduler.js';
import { LeaseTable } from './core/leaseTable.js';
import { MemoryAnalysisStore } from './core/memoryAnalysisStore.js';
import { AnalysisPipeline, DEFAULT_PIPELINE_OPTIONS } from './core/pipeline.js';
import { MockInferenceBackend } from './providers/inference/mock.js';
import { MemoryArtifactStorage } from './providers/storage/memory.js';
import { InProcessJobQueue } from './queue/inProcessQueue.js';
import { encodeWav, sine } from './testing/audio.js';

const RATE = 8192;
const MAX_UPLOAD_BYTES = 64 * 1024;
const GATEWAY_KEY = 'test-secret';

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  let queue: InProcessJobQueue;

  beforeEach(async () => {
    const store = new MemoryAnalysisStore();
    const storage = new MemoryArtifactStorage();
    const backend = new MockInferenceBackend({ confidence: 0.9, latencyMs: 0 });
    const leases = new LeaseTable();
    queue = new InProcessJobQueue(1);
    const scheduler = new JobScheduler({ store, queue, leases, backend });
    const pipeline = new AnalysisPipeline({
      store,
      storage,
      cipher: new AesGcmArtifactCipher(Buffer.alloc(32, 3)),
      decoder: new FormatAwareAudioDecoder({ ffmpegPath: 'ffmpeg', sampleRate: RATE }),
      scheduler,
      leases,
      options: { ...DEFAULT_PIPELINE_OPTIONS, maxUploadBytes: MAX_UPLOAD_BYTES },
    });
    queue.start((jobId) => pipeline.processJob(jobId));

    const app = createApp(
      {
        pipeline,
        store,
        storage,
        queue,
        backend,
        settings: { publicBaseUrl: 'http://faunavox.test', gatewayKeyRequired: true, maxUploadBytes: MAX_UPLOAD_BYTES },
      },
      GATEWAY_KEY,
    );

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await queue.close();
  });

  interface CallOptions {
    method?: string;
    headers?: Record<string, string>;
    body?: Buffer;
    callerId?: string;
  }

  function call(path: string, options: CallOptions = {}) {
    return fetch(`${baseUrl}${path}`, {
      method: options.method ?? 'GET',
      headers: { 'x-api-key': GATEWAY_KEY, 'x-caller-id': options.callerId ?? 'caller-1', ...options.headers },
      body: options.body,
    });
  }

  async function uploadClean(): Promise<string> {
    const response = await call('/v1/artifacts?species=canis_lupus&format=wav', {
      method: 'POST',
      headers: { 'Content-Type': 'audio/wav' },
      body: encodeWav(sine(1024, 0.5, 2, RATE), RATE),
    });
    expect(response.status).toBe(201);
    const body: unknown = await response.json();
    if (typeof body !== 'object' || body === null || !('id' in body) || typeof body.id !== 'string') {
      throw new Error('upload returned no id');
    }
    return body.id;
  }

  it('lists species without authentication', async () => {
    const response = await fetch(`${baseUrl}/v1/species`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ count: 6 });
  });

  it('requires the gateway key on artifact routes', async () => {
    const response = await fetch(`${baseUrl}/v1/artifacts/anything`, { headers: { 'x-caller-id': 'caller-1' } });

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Missing or invalid x-api-key' },
    });
  });

  it('requires a caller id', async () => {
    const response = await fetch(`${baseUrl}/v1/artifacts/anything`, { headers: { 'x-api-key': GATEWAY_KEY } });

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Missing or invalid x-caller-id header' },
    });
  });

  it('uploads, analyses and serves the finished report', async () => {
    const artifactId = await uploadClean();

    const triggered = await call(`/v1/artifacts/${artifactId}/analysis`, { method: 'POST' });
    expect(triggered.status).toBe(202);
    expect(await triggered.json()).toMatchObject({
      artifact_id: artifactId,
      status: 'dispatched',
      deduplicated: false,
      poll_url: `/v1/artifacts/${artifactId}/result`,
    });

    await queue.onIdle();

    const result = await call(`/v1/artifacts/${artifactId}/result`);
    expect(result.status).toBe(200);
    expect(await result.json()).toMatchObject({
      artifact_id: artifactId,
      status: 'succeeded',
      attempts: 1,
      result: { tags: ['mating_call', 'territorial'], confidence: 0.9, partial: false },
    });
  });

  it('answers 202 while no report exists', async () => {
    const artifactId = await uploadClean();

    const response = await call(`/v1/artifacts/${artifactId}/result`);

    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({
      artifact_id: artifactId,
      state: 'not_ready',
      status: 'uploaded',
      job_id: null,
    });
  });

  it("hides another caller's artifact", async () => {
    const artifactId = await uploadClean();

    const response = await call(`/v1/artifacts/${artifactId}`, { callerId: 'caller-2' });

    expect(response.status).toBe(403);
    expect(await response.json()).toEqual({
      error: { code: 'FORBIDDEN', message: 'Artifact does not belong to this caller' },
    });
  });

  it('returns 404 for an unknown artifact', async () => {
    const response = await call('/v1/artifacts/missing/result');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Artifact missing not found' } });
  });

  it('refuses unsupported formats with 415', async () => {
    const response = await call('/v1/artifacts?species=canis_lupus&format=ogg', {
      method: 'POST',
      headers: { 'Content-Type': 'application/octet-stream' },
      body: Buffer.alloc(32, 1),
    });

    expect(response.status).toBe(415);
    expect(await response.json()).toEqual({
      error: {
        code: 'UNSUPPORTED_FORMAT',
        message: "Audio format 'ogg' is not supported",
        details: { format: 'ogg', supported_formats: ['wav', 'mp3', 'flac'] },
      },
    });
  });

  it('refuses bodies over the upload limit with 413', async () => {
    const response = await call('/v1/artifacts?species=canis_lupus&format=wav', {
      method: 'POST',
      headers: { 'Content-Type': 'audio/wav' },
      body: Buffer.alloc(MAX_UPLOAD_BYTES + 1, 1),
    });

    expect(response.status).toBe(413);
    expect(await response.json()).toMatchObject({ error: { code: 'FILE_TOO_LARGE' } });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await call('/v2/nothing');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Route GET /v2/nothing not found' } });
  });
});
