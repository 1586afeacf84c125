import type { DecodedAudio, QualityFlag, QualityVerdict } from '../types/analysis.js';

export interface QualityPolicy {
  /** Samples per analysis frame; must be a power of two. */
  frameSize: number;
  minDurationSeconds: number;
  maxDurationSeconds: number;
  minSnrDb: number;
  clipLevel: number;
  clipRatioThreshold: number;
  /** Frames quieter than this RMS are skipped by the SNR and overlap checks. */
  voicedRms: number;
  /** Spectral peaks below this fraction of the frame maximum are ignored. */
  peakRatio: number;
  overlapSustainSeconds: number;
}

export const DEFAULT_QUALITY_POLICY: QualityPolicy = {
  frameSize: 512,
  minDurationSeconds: 0.5,
  maxDurationSeconds: 3600,
  minSnrDb: 10,
  clipLevel: 0.999,
  clipRatioThreshold: 0.01,
  voicedRms: 0.01,
  peakRatio: 0.3,
  overlapSustainSeconds: 0.25,
};

export const MAX_SNR_DB = 120;
/** A bin counts as tonal once its power is this many times the frame's median bin. */
const TONAL_FLOOR_RATIO = 10;

const FLAG_ORDER: QualityFlag[] = ['noisy', 'overlapping', 'clipped', 'too-short', 'too-long'];

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Splits one frame's power spectrum into tonal energy (bins well above the
 * median bin, less that floor) and the broadband remainder. The median bin
 * stands in for the noise floor, so no silent frames are needed.
 */
export function splitSpectralEnergy(power: Float64Array): { tonal: number; residual: number } {
  if (power.length === 0) return { tonal: 0, residual: 0 };
  const median = Float64Array.from(power).sort()[power.length >> 1];

  let total = 0;
  let tonal = 0;
  for (const value of power) {
    total += value;
    if (value > median * TONAL_FLOOR_RATIO) tonal += value - median;
  }
  return { tonal, residual: total - tonal };
}

export function spectralSnrDb(tonal: number, residual: number): number {
  if (tonal <= 0) return 0;
  if (residual <= 0) return MAX_SNR_DB;
  return Math.min(MAX_SNR_DB, 10 * Math.log10(tonal / residual));
}

export function clippingRatio(samples: Float32Array, clipLevel: number): number {
  if (samples.length === 0) return 0;
  let clipped = 0;
  for (const sample of samples) {
    if (Math.abs(sample) >= clipLevel) clipped += 1;
  }
  return clipped / samples.length;
}

function fftMagnitudes(frame: Float64Array): Float64Array {
  const size = frame.length;
  const re = Float64Array.from(frame);
  const im = new Float64Array(size);

  for (let i = 1, j = 0; i < size; i += 1) {
    let bit = size >> 1;
    for (; j & bit; bit >>= 1) j ^= bit;
    j ^= bit;
    if (i < j) {
      [re[i], re[j]] = [re[j], re[i]];
    }
  }

  for (let length = 2; length <= size; length <<= 1) {
    const angle = (-2 * Math.PI) / length;
    for (let start = 0; start < size; start += length) {
      for (let k = 0; k < length / 2; k += 1) {
        const wr = Math.cos(angle * k);
        const wi = Math.sin(angle * k);
        const a = start + k;
        const b = a + length / 2;
        const tr = re[b] * wr - im[b] * wi;
        const ti = re[b] * wi + im[b] * wr;
        re[b] = re[a] - tr;
        im[b] = im[a] - ti;
        re[a] += tr;
        im[a] += ti;
      }
    }
  }

  const magnitudes = new Float64Array(size / 2);
  for (let bin = 0; bin < size / 2; bin += 1) {
    magnitudes[bin] = Math.hypot(re[bin], im[bin]);
  }
  return magnitudes;
}

/**
 * Number of distinct sources in one frame's spectrum. Peaks close to an
 * integer multiple of an already-counted source are treated as its harmonics.
 */
export function countSpectralSources(magnitudes: Float64Array, peakRatio: number): number {
  let max = 0;
  for (let bin = 1; bin < magnitudes.length; bin += 1) {
    max = Math.max(max, magnitudes[bin]);
  }
  if (max <= 0) return 0;

  const sources: number[] = [];
  for (let bin = 2; bin < magnitudes.length - 1; bin += 1) {
    const value = magnitudes[bin];
    const isPeak = value > magnitudes[bin - 1] && value >= magnitudes[bin + 1];
    if (!isPeak || value < max * peakRatio) continue;

    const harmonic = sources.some((fundamental) => {
      const multiple = Math.round(bin / fundamental);
      return multiple >= 1 && Math.abs(bin - multiple * fundamental) <= multiple;
    });
    if (!harmonic) sources.push(bin);
  }
  return sources.length;
}

interface SpectralAnalysis {
  snrDb: number;
  overlapRatio: number;
  sustained: boolean;
}

/**
 * One pass over the voiced frames: tonal-to-residual SNR and overlapping
 * sources. Frames quieter than `voicedRms` are skipped by both.
 */
function analyzeSpectrum(samples: Float32Array, sampleRate: number, policy: QualityPolicy): SpectralAnalysis {
  const { frameSize } = policy;
  const frameCount = Math.floor(samples.length / frameSize);
  const window = new Float64Array(frameSize);
  for (let index = 0; index < frameSize; index += 1) {
    window[index] = 0.5 - 0.5 * Math.cos((2 * Math.PI * index) / (frameSize - 1));
  }
  const sustainFrames = Math.max(1, Math.ceil((policy.overlapSustainSeconds * sampleRate) / frameSize));

  let voiced = 0;
  let overlapping = 0;
  let run = 0;
  let longestRun = 0;
  let tonal = 0;
  let residual = 0;

  for (let frame = 0; frame < frameCount; frame += 1) {
    const start = frame * frameSize;
    const windowed = new Float64Array(frameSize);
    let energy = 0;
    for (let index = 0; index < frameSize; index += 1) {
      const sample = samples[start + index];
      energy += sample * sample;
      windowed[index] = sample * window[index];
    }

    if (Math.sqrt(energy / frameSize) < policy.voicedRms) {
      run = 0;
      continue;
    }
    voiced += 1;

    const magnitudes = fftMagnitudes(windowed);
    const split = splitSpectralEnergy(magnitudes.map((magnitude) => magnitude * magnitude));
    tonal += split.tonal;
    residual += split.residual;

    if (countSpectralSources(magnitudes, policy.peakRatio) > 1) {
      overlapping += 1;
      run += 1;
      longestRun = Math.max(longestRun, run);
    } else {
      run = 0;
    }
  }

  return {
    snrDb: voiced > 0 ? spectralSnrDb(tonal, residual) : 0,
    overlapRatio: voiced > 0 ? overlapping / voiced : 0,
    sustained: longestRun >= sustainFrames,
  };
}

/**
 * Quality gate run before any inference. Pure function of the decoded
 * signal: clipping and out-of-range duration make the audio unusable, noise
 * and overlapping callers only mark the eventual result as partial.
 */
export function assessQuality(
  artifactId: string,
  audio: DecodedAudio,
  policy: QualityPolicy = DEFAULT_QUALITY_POLICY,
): QualityVerdict {
  const { samples, sampleRate } = audio;
  const durationSeconds = sampleRate > 0 ? samples.length / sampleRate : 0;
  const flags = new Set<QualityFlag>();

  if (durationSeconds < policy.minDurationSeconds) flags.add('too-short');
  if (durationSeconds > policy.maxDurationSeconds) flags.add('too-long');
  const durationInBounds = !flags.has('too-short') && !flags.has('too-long');

  const clipRatio = clippingRatio(samples, policy.clipLevel);
  if (clipRatio > policy.clipRatioThreshold) flags.add('clipped');

  let snrDb = 0;
  let overlapRatio = 0;
  if (durationInBounds) {
    const spectrum = analyzeSpectrum(samples, sampleRate, policy);
    snrDb = spectrum.snrDb;
    overlapRatio = spectrum.overlapRatio;
    if (snrDb < policy.minSnrDb) flags.add('noisy');
    if (spectrum.sustained) flags.add('overlapping');
  }

  const score = durationInBounds
    ? clamp01(snrDb / 30) *
      clamp01(1 - clipRatio / (2 * policy.clipRatioThreshold)) *
      (1 - 0.5 * overlapRatio)
    : 0;

  return {
    artifact_id: artifactId,
    flags: FLAG_ORDER.filter((flag) => flags.has(flag)),
    score: round(clamp01(score), 4),
    usable: !flags.has('clipped') && durationInBounds,
    metrics: {
      duration_seconds: round(durationSeconds, 3),
      snr_db: round(snrDb, 2),
      clipping_ratio: round(clipRatio, 4),
      overlap_ratio: round(overlapRatio, 4),
    },
  };
}
