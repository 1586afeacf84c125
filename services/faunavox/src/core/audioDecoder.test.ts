import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { encodeWav } from '../testing/audio.js';
import { FormatAwareAudioDecoder, decodeWav } from './audioDecoder.js';
import { AudioDecodeError } from './errors.js';

function wavWithFormat(params: {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  data: Buffer;
  extraChunk?: Buffer;
}): Buffer {
  const blockAlign = (params.bitsPerSample / 8) * params.channels;
  const fmt = Buffer.alloc(24);
  fmt.write('fmt ', 0, 'ascii');
  fmt.writeUInt32LE(16, 4);
  fmt.writeUInt16LE(params.audioFormat, 8);
  fmt.writeUInt16LE(params.channels, 10);
  fmt.writeUInt32LE(params.sampleRate, 12);
  fmt.writeUInt32LE(params.sampleRate * blockAlign, 16);
  fmt.writeUInt16LE(blockAlign, 20);
  fmt.writeUInt16LE(params.bitsPerSample, 22);

  const dataHeader = Buffer.alloc(8);
  dataHeader.write('data', 0, 'ascii');
  dataHeader.writeUInt32LE(params.data.byteLength, 4);

  const body = Buffer.concat([fmt, params.extraChunk ?? Buffer.alloc(0), dataHeader, params.data]);
  const header = Buffer.alloc(12);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(4 + body.byteLength, 4);
  header.write('WAVE', 8, 'ascii');
  return Buffer.concat([header, body]);
}

describe('decodeWav', () => {
  it('reads mono 16-bit PCM', () => {
    const decoded = decodeWav(encodeWav(Float32Array.from([0, 0.5, -0.5, 1]), 8000));

    expect(decoded.sampleRate).toBe(8000);
    expect(Array.from(decoded.samples)).toEqual([0, 0.5, -16383 / 32768, 32767 / 32768]);
  });

  it('averages stereo channels', () => {
    const data = Buffer.alloc(8);
    data.writeInt16LE(16384, 0);
    data.writeInt16LE(0, 2);
    data.writeInt16LE(-8192, 4);
    data.writeInt16LE(-8192, 6);

    const decoded = decodeWav(wavWithFormat({ audioFormat: 1, channels: 2, sampleRate: 44100, bitsPerSample: 16, data }));

    expect(Array.from(decoded.samples)).toEqual([0.25, -0.25]);
  });

  it('reads 32-bit float and skips unknown chunks', () => {
    const data = Buffer.alloc(8);
    data.writeFloatLE(0.25, 0);
    data.writeFloatLE(-0.75, 4);
    const list = Buffer.alloc(11);
    list.write('LIST', 0, 'ascii');
    list.writeUInt32LE(3, 4);

    const decoded = decodeWav(
      wavWithFormat({ audioFormat: 3, channels: 1, sampleRate: 16000, bitsPerSample: 32, data, extraChunk: Buffer.concat([list, Buffer.alloc(1)]) }),
    );

    expect(Array.from(decoded.samples)).toEqual([0.25, -0.75]);
  });

  it('reads 8-bit unsigned PCM', () => {
    const decoded = decodeWav(
      wavWithFormat({ audioFormat: 1, channels: 1, sampleRate: 8000, bitsPerSample: 8, data: Buffer.from([128, 192, 64]) }),
    );

    expect(Array.from(decoded.samples)).toEqual([0, 0.5, -0.5]);
  });

  it('rejects non-RIFF input', () => {
    expect(() => decodeWav(Buffer.from('ID3 definitely not a wav'))).toThrow(AudioDecodeError);
  });

  it('rejects a file without a data chunk', () => {
    const full = encodeWav(Float32Array.from([0.1]), 8000);
    expect(() => decodeWav(full.subarray(0, 36))).toThrow('WAV file has no data chunk');
  });

  it('rejects unsupported encodings', () => {
    expect(() =>
      decodeWav(wavWithFormat({ audioFormat: 2, channels: 1, sampleRate: 8000, bitsPerSample: 16, data: Buffer.alloc(4) })),
    ).toThrow('Unsupported WAV encoding tag 2');
  });
});

describe('FormatAwareAudioDecoder', () => {
  it('decodes wav in-process', async () => {
    const decoder = new FormatAwareAudioDecoder({ ffmpegPath: 'ffmpeg-not-used', sampleRate: 16000 });
    const decoded = await decoder.decode(encodeWav(Float32Array.from([0, 0.5]), 8000), 'wav');

    expect(decoded.sampleRate).toBe(8000);
    expect(decoded.samples.length).toBe(2);
  });

  it('reports a missing ffmpeg binary as a decode error', async () => {
    const decoder = new FormatAwareAudioDecoder({ ffmpegPath: '/nonexistent/ffmpeg', sampleRate: 16000 });

    await expect(decoder.decode(Buffer.from([0xff, 0xfb, 0x90, 0x00]), 'mp3')).rejects.toThrow(
      'ffmpeg could not be started',
    );
  });

  it('kills an ffmpeg that never finishes', async () => {
    const directory = await mkdtemp(join(tmpdir(), 'faunavox-ffmpeg-'));
    const stalled = join(directory, 'ffmpeg');
    await writeFile(stalled, '#!/bin/sh\nexec sleep 30\n', { mode: 0o755 });

    try {
      const decoder = new FormatAwareAudioDecoder({ ffmpegPath: stalled, sampleRate: 16000, timeoutMs: 50 });
      const started = Date.now();

      const error = await decoder.decode(Buffer.from([0x66, 0x4c, 0x61, 0x43]), 'flac').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AudioDecodeError);
      expect(error).toMatchObject({ code: 'AUDIO_DECODE_FAILED', message: 'ffmpeg did not finish within 50ms' });
      expect(Date.now() - started).toBeLessThan(5_000);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
