import { spawn } from 'child_process';
import type { AudioFormat, DecodedAudio } from '../types/analysis.js';
import { AudioDecodeError } from './errors.js';

export interface AudioDecoder {
  decode(bytes: Buffer, format: AudioFormat): Promise<DecodedAudio>;
}

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

interface WavFormat {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  blockAlign: number;
  bitsPerSample: number;
}

function readFmtChunk(bytes: Buffer, offset: number, size: number): WavFormat {
  if (size < 16) {
    throw new AudioDecodeError('WAV fmt chunk is truncated');
  }
  let audioFormat = bytes.readUInt16LE(offset);
  if (audioFormat === WAVE_FORMAT_EXTENSIBLE && size >= 26) {
    // first two bytes of the SubFormat GUID carry the real format tag
    audioFormat = bytes.readUInt16LE(offset + 24);
  }
  return {
    audioFormat,
    channels: bytes.readUInt16LE(offset + 2),
    sampleRate: bytes.readUInt32LE(offset + 4),
    blockAlign: bytes.readUInt16LE(offset + 12),
    bitsPerSample: bytes.readUInt16LE(offset + 14),
  };
}

function sampleReader(format: WavFormat): (bytes: Buffer, offset: number) => number {
  if (format.audioFormat === WAVE_FORMAT_IEEE_FLOAT && format.bitsPerSample === 32) {
    return (bytes, offset) => bytes.readFloatLE(offset);
  }
  if (format.audioFormat !== WAVE_FORMAT_PCM) {
    throw new AudioDecodeError(`Unsupported WAV encoding tag ${format.audioFormat}`);
  }
  switch (format.bitsPerSample) {
    case 8:
      return (bytes, offset) => (bytes.readUInt8(offset) - 128) / 128;
    case 16:
      return (bytes, offset) => bytes.readInt16LE(offset) / 32768;
    case 24:
      return (bytes, offset) => bytes.readIntLE(offset, 3) / 8388608;
    case 32:
      return (bytes, offset) => bytes.readInt32LE(offset) / 2147483648;
    default:
      throw new AudioDecodeError(`Unsupported WAV bit depth ${format.bitsPerSample}`);
  }
}

/**
 * Parses a RIFF/WAVE buffer into mono float samples, averaging channels.
 */
export function decodeWav(bytes: Buffer): DecodedAudio {
  if (bytes.byteLength < 12 || bytes.toString('ascii', 0, 4) !== 'RIFF' || bytes.toString('ascii', 8, 12) !== 'WAVE') {
    throw new AudioDecodeError('Not a RIFF/WAVE file');
  }

  let format: WavFormat | undefined;
  let data: Buffer | undefined;
  let offset = 12;

  while (offset + 8 <= bytes.byteLength) {
    const chunkId = bytes.toString('ascii', offset, offset + 4);
    const chunkSize = bytes.readUInt32LE(offset + 4);
    const bodyStart = offset + 8;
    const bodyEnd = Math.min(bytes.byteLength, bodyStart + chunkSize);

    if (chunkId === 'fmt ') {
      format = readFmtChunk(bytes, bodyStart, bodyEnd - bodyStart);
    } else if (chunkId === 'data') {
      data = bytes.subarray(bodyStart, bodyEnd);
    }

    offset = bodyStart + chunkSize + (chunkSize % 2);
  }

  if (!format) throw new AudioDecodeError('WAV file has no fmt chunk');
  if (!data) throw new AudioDecodeError('WAV file has no data chunk');
  if (format.channels < 1 || format.sampleRate < 1) {
    throw new AudioDecodeError('WAV file declares no channels or no sample rate');
  }

  const bytesPerSample = format.bitsPerSample / 8;
  if (!Number.isInteger(bytesPerSample) || format.blockAlign !== bytesPerSample * format.channels) {
    throw new AudioDecodeError('WAV block alignment does not match its sample layout');
  }

  const read = sampleReader(format);
  const frameCount = Math.floor(data.byteLength / format.blockAlign);
  const samples = new Float32Array(frameCount);

  for (let frame = 0; frame < frameCount; frame += 1) {
    const frameOffset = frame * format.blockAlign;
    let sum = 0;
    for (let channel = 0; channel < format.channels; channel += 1) {
      sum += read(data, frameOffset + channel * bytesPerSample);
    }
    samples[frame] = sum / format.channels;
  }

  return { sampleRate: format.sampleRate, samples };
}

export const DEFAULT_DECODE_TIMEOUT_MS = 30_000;

export interface FfmpegDecodeOptions {
  sampleRate: number;
  ffmpegPath: string;
  /** ffmpeg is killed and the decode fails after this long. */
  timeoutMs?: number;
}

/**
 * Decodes compressed formats by piping them through ffmpeg as mono 32-bit
 * float PCM.
 */
export async function decodeWithFfmpeg(bytes: Buffer, options: FfmpegDecodeOptions): Promise<DecodedAudio> {
  const { sampleRate, ffmpegPath } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_DECODE_TIMEOUT_MS;

  const output = await new Promise<Buffer>((resolve, reject) => {
    const child = spawn(ffmpegPath, [
      '-hide_banner',
      '-loglevel',
      'error',
      '-i',
      'pipe:0',
      '-f',
      'f32le',
      '-ac',
      '1',
      '-ar',
      String(sampleRate),
      'pipe:1',
    ]);
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      reject(new AudioDecodeError(`ffmpeg did not finish within ${timeoutMs}ms`));
    }, timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', (cause) => {
      clearTimeout(timer);
      reject(new AudioDecodeError(`ffmpeg could not be started: ${cause.message}`));
    });
    child.on('close', (code) => {
      clearTimeout(timer);
      if (code === 0) {
        resolve(Buffer.concat(stdout));
        return;
      }
      const detail = Buffer.concat(stderr).toString('utf8').trim();
      reject(new AudioDecodeError(`ffmpeg exited with code ${code}${detail ? `: ${detail}` : ''}`));
    });
    // ffmpeg may close stdin early on garbage input
    child.stdin.on('error', () => undefined);
    child.stdin.end(bytes);
  });

  const samples = new Float32Array(Math.floor(output.byteLength / 4));
  for (let index = 0; index < samples.length; index += 1) {
    samples[index] = output.readFloatLE(index * 4);
  }
  return { sampleRate, samples };
}

export class FormatAwareAudioDecoder implements AudioDecoder {
  constructor(private readonly options: FfmpegDecodeOptions) {}

  async decode(bytes: Buffer, format: AudioFormat): Promise<DecodedAudio> {
    if (format === 'wav') {
      return decodeWav(bytes);
    }
    return decodeWithFfmpeg(bytes, this.options);
  }
}
