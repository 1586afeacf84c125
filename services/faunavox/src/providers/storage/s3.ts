import {
  DeleteObjectCommand,
  GetObjectCommand,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { ArtifactNotFoundError, StorageUnavailableError } from '../../core/errors.js';
import type { ArtifactStorage } from './types.js';

export interface S3StorageOptions {
  endpoint: string;
  region: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle: boolean;
  keyPrefix: string;
}

function normalizePrefix(prefix: string): string {
  return prefix.replace(/^\/+|\/+$/g, '');
}

function isMissingObject(error: unknown): boolean {
  if (error instanceof NoSuchKey) return true;
  return error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound');
}

export class S3ArtifactStorage implements ArtifactStorage {
  readonly name = 's3';
  private readonly client: S3Client;
  private readonly prefix: string;

  constructor(private readonly options: S3StorageOptions) {
    this.client = new S3Client({
      endpoint: options.endpoint,
      region: options.region,
      forcePathStyle: options.forcePathStyle,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
    });
    this.prefix = normalizePrefix(options.keyPrefix);
  }

  private objectKey(key: string): string {
    return this.prefix ? `${this.prefix}/${key}` : key;
  }

  async put(key: string, ciphertext: Buffer): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.options.bucket,
          Key: this.objectKey(key),
          Body: ciphertext,
          ContentType: 'application/octet-stream',
        }),
      );
    } catch (error) {
      throw new StorageUnavailableError(`Failed to write ${key}`, error);
    }
  }

  async get(key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.options.bucket,
          Key: this.objectKey(key),
        }),
      );
      if (!response.Body) {
        throw new ArtifactNotFoundError(key);
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (error instanceof ArtifactNotFoundError) throw error;
      if (isMissingObject(error)) throw new ArtifactNotFoundError(key);
      throw new StorageUnavailableError(`Failed to read ${key}`, error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.options.bucket,
          Key: this.objectKey(key),
        }),
      );
    } catch (error) {
      throw new StorageUnavailableError(`Failed to delete ${key}`, error);
    }
  }
}
