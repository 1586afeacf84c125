import { describe, expect, it } from 'vitest';
import { AesGcmArtifactCipher, parseEncryptionKey } from './encryption.js';

const HEX_KEY = '0f'.repeat(32);

describe('parseEncryptionKey', () => {
  it('accepts 64 hex characters', () => {
    expect(parseEncryptionKey(HEX_KEY)).toEqual(Buffer.alloc(32, 0x0f));
  });

  it('accepts base64 of 32 bytes', () => {
    const encoded = Buffer.alloc(32, 7).toString('base64');
    expect(parseEncryptionKey(` ${encoded} `)).toEqual(Buffer.alloc(32, 7));
  });

  it('rejects keys of the wrong length', () => {
    expect(() => parseEncryptionKey('test-secret')).toThrow('ARTIFACT_ENCRYPTION_KEY must decode to exactly 32 bytes');
  });
});

describe('AesGcmArtifactCipher', () => {
  const cipher = new AesGcmArtifactCipher(parseEncryptionKey(HEX_KEY));
  const plaintext = Buffer.from('RIFF....WAVEfmt test recording');

  it('decrypts what it encrypted', () => {
    const sealed = cipher.encrypt(plaintext);

    expect(sealed.byteLength).toBe(12 + 16 + plaintext.byteLength);
    expect(sealed.includes(plaintext)).toBe(false);
    expect(cipher.decrypt(sealed)).toEqual(plaintext);
  });

  it('uses a fresh IV per blob', () => {
    expect(cipher.encrypt(plaintext).equals(cipher.encrypt(plaintext))).toBe(false);
  });

  it('detects tampering', () => {
    const sealed = cipher.encrypt(plaintext);
    sealed[sealed.byteLength - 1] ^= 0xff;
    expect(() => cipher.decrypt(sealed)).toThrow();
  });

  it('rejects truncated input', () => {
    expect(() => cipher.decrypt(Buffer.alloc(10))).toThrow('Encrypted artifact is truncated');
  });

  it('requires a 32-byte key', () => {
    expect(() => new AesGcmArtifactCipher(Buffer.alloc(16))).toThrow('AES-256-GCM requires a 32-byte key');
  });
});
