import { config } from '../../config.js';
import { LocalArtifactStorage } from './local.js';
import { MemoryArtifactStorage } from './memory.js';
import { S3ArtifactStorage } from './s3.js';
import type { ArtifactStorage } from './types.js';

export function createArtifactStorage(): ArtifactStorage {
  if (config.storageBackend === 's3') {
    return new S3ArtifactStorage({
      endpoint: config.s3Endpoint,
      region: config.s3Region,
      bucket: config.s3Bucket,
      accessKeyId: config.s3AccessKeyId,
      secretAccessKey: config.s3SecretAccessKey,
      forcePathStyle: config.s3ForcePathStyle,
      keyPrefix: config.s3KeyPrefix,
    });
  }
  if (config.storageBackend === 'memory') {
    return new MemoryArtifactStorage();
  }
  return new LocalArtifactStorage(config.artifactsDir);
}
