import { ArtifactNotFoundError } from '../../core/errors.js';
import type { ArtifactStorage } from './types.js';

export class MemoryArtifactStorage implements ArtifactStorage {
  readonly name = 'memory';
  private readonly objects = new Map<string, Buffer>();

  async put(key: string, ciphertext: Buffer): Promise<void> {
    this.objects.set(key, Buffer.from(ciphertext));
  }

  async get(key: string): Promise<Buffer> {
    const stored = this.objects.get(key);
    if (!stored) {
      throw new ArtifactNotFoundError(key);
    }
    return Buffer.from(stored);
  }

  async delete(key: string): Promise<void> {
    this.objects.delete(key);
  }

  has(key: string): boolean {
    return this.objects.has(key);
  }

  get size(): number {
    return this.objects.size;
  }
}
