/**
 * Opaque blob store for encrypted recordings. Implementations never see
 * plaintext and never retry; callers decide retry policy.
 */
export interface ArtifactStorage {
  readonly name: string;
  put(key: string, ciphertext: Buffer): Promise<void>;
  /** Throws ArtifactNotFoundError for unknown keys, StorageUnavailableError otherwise. */
  get(key: string): Promise<Buffer>;
  delete(key: string): Promise<void>;
}
