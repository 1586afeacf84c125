import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { dirname, join, resolve, sep } from 'path';
import { ArtifactNotFoundError, StorageUnavailableError } from '../../core/errors.js';
import type { ArtifactStorage } from './types.js';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class LocalArtifactStorage implements ArtifactStorage {
  readonly name = 'local';
  private readonly root: string;

  constructor(directory: string) {
    this.root = resolve(directory);
  }

  private pathFor(key: string): string {
    const fullPath = resolve(join(this.root, key));
    if (!fullPath.startsWith(`${this.root}${sep}`)) {
      throw new StorageUnavailableError(`Storage key escapes the artifacts directory: ${key}`);
    }
    return fullPath;
  }

  async put(key: string, ciphertext: Buffer): Promise<void> {
    const fullPath = this.pathFor(key);
    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, ciphertext);
    } catch (error) {
      throw new StorageUnavailableError(`Failed to write ${key}`, error);
    }
  }

  async get(key: string): Promise<Buffer> {
    const fullPath = this.pathFor(key);
    try {
      return await readFile(fullPath);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        throw new ArtifactNotFoundError(key);
      }
      throw new StorageUnavailableError(`Failed to read ${key}`, error);
    }
  }

  async delete(key: string): Promise<void> {
    const fullPath = this.pathFor(key);
    try {
      await rm(fullPath, { force: true });
    } catch (error) {
      throw new StorageUnavailableError(`Failed to delete ${key}`, error);
    }
  }
}
