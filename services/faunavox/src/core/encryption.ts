import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';

export interface ArtifactCipher {
  encrypt(plaintext: Buffer): Buffer;
  decrypt(ciphertext: Buffer): Buffer;
}

const IV_BYTES = 12;
const TAG_BYTES = 16;

/**
 * Parses a 32-byte key given as 64 hex characters or as base64.
 */
export function parseEncryptionKey(raw: string): Buffer {
  const trimmed = raw.trim();
  const key = /^[0-9a-fA-F]{64}$/.test(trimmed)
    ? Buffer.from(trimmed, 'hex')
    : Buffer.from(trimmed, 'base64');
  if (key.byteLength !== 32) {
    throw new Error('ARTIFACT_ENCRYPTION_KEY must decode to exactly 32 bytes');
  }
  return key;
}

/**
 * AES-256-GCM with a fresh IV per blob. Layout: iv (12) | tag (16) | ciphertext.
 */
export class AesGcmArtifactCipher implements ArtifactCipher {
  constructor(private readonly key: Buffer) {
    if (key.byteLength !== 32) {
      throw new Error('AES-256-GCM requires a 32-byte key');
    }
  }

  encrypt(plaintext: Buffer): Buffer {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv('aes-256-gcm', this.key, iv);
    const body = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([iv, cipher.getAuthTag(), body]);
  }

  decrypt(ciphertext: Buffer): Buffer {
    if (ciphertext.byteLength < IV_BYTES + TAG_BYTES) {
      throw new Error('Encrypted artifact is truncated');
    }
    const iv = ciphertext.subarray(0, IV_BYTES);
    const tag = ciphertext.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
    const decipher = createDecipheriv('aes-256-gcm', this.key, iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext.subarray(IV_BYTES + TAG_BYTES)), decipher.final()]);
  }
}
