import 'dotenv/config';
import { resolve } from 'path';

const DEFAULT_PORT = 3020;

const STORE_BACKENDS = ['memory', 'postgres'] as const;
const QUEUE_BACKENDS = ['memory', 'redis'] as const;
const STORAGE_BACKENDS = ['local', 's3', 'memory'] as const;
const INFERENCE_BACKENDS = ['mock', 'http'] as const;

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function floatFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function boolFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = raw.toLowerCase().trim();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return fallback;
}

function choiceFromEnv<T extends string>(name: string, choices: readonly T[], fallback: T): T {
  const raw = (process.env[name] || '').toLowerCase().trim();
  if (!raw) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(', ')}`);
  }
  return match;
}

const port = intFromEnv('PORT', DEFAULT_PORT);

export const config = {
  port,
  publicBaseUrl: process.env.PUBLIC_BASE_URL || `http://localhost:${port}`,
  masterApiKey: process.env.MASTER_API_KEY || '',
  storeBackend: choiceFromEnv('STORE_BACKEND', STORE_BACKENDS, 'memory'),
  databaseUrl: process.env.DATABASE_URL || '',
  dbHost: process.env.PGHOST || '',
  dbPort: intFromEnv('PGPORT', 5432),
  dbUser: process.env.PGUSER || '',
  dbPassword: process.env.PGPASSWORD || '',
  dbName: process.env.PGDATABASE || '',
  dbSsl: boolFromEnv('DB_SSL', true),
  queueBackend: choiceFromEnv('QUEUE_BACKEND', QUEUE_BACKENDS, 'memory'),
  redisUrl: process.env.REDIS_URL || '',
  storageBackend: choiceFromEnv('STORAGE_BACKEND', STORAGE_BACKENDS, 'local'),
  artifactsDir: resolve(process.cwd(), process.env.ARTIFACTS_DIR || 'data/audio'),
  s3Endpoint: process.env.S3_ENDPOINT || '',
  s3Bucket: process.env.S3_BUCKET || '',
  s3Region: process.env.S3_REGION || 'auto',
  s3AccessKeyId: process.env.S3_ACCESS_KEY_ID || '',
  s3SecretAccessKey: process.env.S3_SECRET_ACCESS_KEY || '',
  s3ForcePathStyle: boolFromEnv('S3_FORCE_PATH_STYLE', true),
  s3KeyPrefix: process.env.S3_KEY_PREFIX || 'artifacts',
  encryptionKey: process.env.ARTIFACT_ENCRYPTION_KEY || '',
  inferenceBackend: choiceFromEnv('INFERENCE_BACKEND', INFERENCE_BACKENDS, 'mock'),
  inferenceUrl: process.env.INFERENCE_URL || '',
  inferenceApiKey: process.env.INFERENCE_API_KEY || '',
  mockConfidence: floatFromEnv('MOCK_INFERENCE_CONFIDENCE', 0.85),
  mockLatencyMs: intFromEnv('MOCK_INFERENCE_LATENCY_MS', 250),
  maxUploadBytes: intFromEnv('MAX_UPLOAD_BYTES', 50 * 1024 * 1024),
  maxConcurrentJobs: intFromEnv('MAX_CONCURRENT_JOBS', 2),
  jobTimeoutMs: intFromEnv('JOB_TIMEOUT_MS', 120_000),
  maxInferenceRetries: intFromEnv('MAX_INFERENCE_RETRIES', 3),
  retryBaseDelayMs: intFromEnv('RETRY_BASE_DELAY_MS', 500),
  retryMaxDelayMs: intFromEnv('RETRY_MAX_DELAY_MS', 8_000),
  accuracyFloor: floatFromEnv('ACCURACY_FLOOR', 0.8),
  minDurationSeconds: floatFromEnv('QC_MIN_DURATION_SECONDS', 0.5),
  maxDurationSeconds: floatFromEnv('QC_MAX_DURATION_SECONDS', 3600),
  minSnrDb: floatFromEnv('QC_MIN_SNR_DB', 10),
  clipRatioThreshold: floatFromEnv('QC_CLIP_RATIO_THRESHOLD', 0.01),
  ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
  decodeSampleRate: intFromEnv('DECODE_SAMPLE_RATE', 16_000),
  decodeTimeoutMs: intFromEnv('DECODE_TIMEOUT_MS', 30_000),
} as const;

if (config.storeBackend === 'postgres' && !config.databaseUrl && !(config.dbHost && config.dbUser && config.dbName)) {
  throw new Error('DATABASE_URL or PGHOST/PGUSER/PGDATABASE is required when STORE_BACKEND=postgres');
}

if (config.queueBackend === 'redis' && !config.redisUrl) {
  throw new Error('REDIS_URL is required when QUEUE_BACKEND=redis');
}

if (config.queueBackend === 'redis' && config.storeBackend === 'memory') {
  throw new Error('QUEUE_BACKEND=redis needs STORE_BACKEND=postgres so workers can see job state');
}

if (!config.encryptionKey) {
  throw new Error('ARTIFACT_ENCRYPTION_KEY is required');
}

if (config.inferenceBackend === 'http' && !config.inferenceUrl) {
  throw new Error('INFERENCE_URL is required when INFERENCE_BACKEND=http');
}

if (config.accuracyFloor > 1) {
  throw new Error('ACCURACY_FLOOR must be between 0 and 1');
}

if (config.storageBackend === 's3') {
  if (!config.s3Endpoint) {
    throw new Error('S3_ENDPOINT is required when STORAGE_BACKEND=s3');
  }
  if (!config.s3Bucket) {
    throw new Error('S3_BUCKET is required when STORAGE_BACKEND=s3');
  }
  if (!config.s3AccessKeyId || !config.s3SecretAccessKey) {
    throw new Error('S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY are required when STORAGE_BACKEND=s3');
  }
}
