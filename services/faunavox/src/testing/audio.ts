/**
 * Signal generators and a minimal WAV writer for tests.
 */

export function sine(frequency: number, amplitude: number, seconds: number, sampleRate: number): Float32Array {
  const length = Math.round(seconds * sampleRate);
  const samples = new Float32Array(length);
  for (let index = 0; index < length; index += 1) {
    samples[index] = amplitude * Math.sin((2 * Math.PI * frequency * index) / sampleRate);
  }
  return samples;
}

export function silence(seconds: number, sampleRate: number): Float32Array {
  return new Float32Array(Math.round(seconds * sampleRate));
}

export function square(amplitude: number, periodSamples: number, seconds: number, sampleRate: number): Float32Array {
  const length = Math.round(seconds * sampleRate);
  const samples = new Float32Array(length);
  for (let index = 0; index < length; index += 1) {
    samples[index] = Math.floor((2 * index) / periodSamples) % 2 === 0 ? amplitude : -amplitude;
  }
  return samples;
}

/** Uniform noise in [-amplitude, amplitude) from a fixed-seed LCG. */
export function noise(amplitude: number, seconds: number, sampleRate: number, seed = 12345): Float32Array {
  const length = Math.round(seconds * sampleRate);
  const samples = new Float32Array(length);
  let state = seed >>> 0;
  for (let index = 0; index < length; index += 1) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    samples[index] = amplitude * ((state / 2 ** 32) * 2 - 1);
  }
  return samples;
}

export function mix(...signals: Float32Array[]): Float32Array {
  const length = Math.max(0, ...signals.map((signal) => signal.length));
  const mixed = new Float32Array(length);
  for (const signal of signals) {
    for (let index = 0; index < signal.length; index += 1) {
      mixed[index] += signal[index];
    }
  }
  return mixed;
}

export function concat(...signals: Float32Array[]): Float32Array {
  const joined = new Float32Array(signals.reduce((total, signal) => total + signal.length, 0));
  let offset = 0;
  for (const signal of signals) {
    joined.set(signal, offset);
    offset += signal.length;
  }
  return joined;
}

/** Mono 16-bit PCM WAV. */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const dataBytes = samples.length * 2;
  const buffer = Buffer.alloc(44 + dataBytes);

  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataBytes, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(1, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * 2, 28);
  buffer.writeUInt16LE(2, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataBytes, 40);

  for (let index = 0; index < samples.length; index += 1) {
    const clamped = Math.max(-1, Math.min(1, samples[index]));
    buffer.writeInt16LE(Math.round(clamped * 32767), 44 + index * 2);
  }
  return buffer;
}
