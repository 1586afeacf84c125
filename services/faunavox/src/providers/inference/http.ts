import { InferenceUnavailableError, ModelError } from '../../core/errors.js';
import type { InferenceOutput } from '../../types/analysis.js';
import type { InferenceBackend, InferenceRequest, InferenceResult } from '../../types/inference.js';

export interface HttpInferenceOptions {
  baseUrl: string;
  apiKey?: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

function encodeSamples(samples: Float32Array): string {
  const bytes = Buffer.alloc(samples.length * 4);
  for (let index = 0; index < samples.length; index += 1) {
    bytes.writeFloatLE(samples[index], index * 4);
  }
  return bytes.toString('base64');
}

function parseBody(raw: string): unknown {
  if (!raw) return {};
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return { message: raw };
  }
}

function errorMessageFrom(payload: unknown, fallback: string): string {
  if (!isObject(payload)) return fallback;
  const nested = payload.error;
  if (isObject(nested) && typeof nested.message === 'string') return nested.message;
  if (typeof payload.message === 'string') return payload.message;
  return fallback;
}

export function parseInferenceOutput(payload: unknown): { ok: true; value: InferenceOutput } | { ok: false; message: string } {
  if (!isObject(payload)) {
    return { ok: false, message: 'Inference response must be a JSON object' };
  }

  const { translation, tags, confidence } = payload;
  if (translation !== null && translation !== undefined && typeof translation !== 'string') {
    return { ok: false, message: 'translation must be a string or null' };
  }
  if (!Array.isArray(tags) || !tags.every((tag): tag is string => typeof tag === 'string')) {
    return { ok: false, message: 'tags must be an array of strings' };
  }
  if (typeof confidence !== 'number' || !Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    return { ok: false, message: 'confidence must be a number in [0, 1]' };
  }

  return {
    ok: true,
    value: {
      translation: typeof translation === 'string' ? translation : null,
      tags,
      confidence,
    },
  };
}

/**
 * Talks to an external model service over JSON. 5xx, 408, 429 and network
 * failures are transient; any other 4xx or a malformed answer is a model error.
 */
export class HttpInferenceBackend implements InferenceBackend {
  readonly name = 'http';
  private readonly baseUrl: string;

  constructor(private readonly options: HttpInferenceOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
  }

  async infer(request: InferenceRequest): Promise<InferenceResult> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/v1/infer`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          job_id: request.jobId,
          species: request.species,
          sample_rate: request.audio.sampleRate,
          encoding: 'f32le',
          samples: encodeSamples(request.audio.samples),
        }),
        signal: request.signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Inference request failed';
      return { ok: false, error: new InferenceUnavailableError(`Inference service unreachable: ${message}`) };
    }

    const payload = parseBody(await response.text());

    if (response.status >= 500 || response.status === 408 || response.status === 429) {
      return {
        ok: false,
        error: new InferenceUnavailableError(errorMessageFrom(payload, `Inference service returned ${response.status}`)),
      };
    }
    if (!response.ok) {
      return {
        ok: false,
        error: new ModelError(errorMessageFrom(payload, `Inference service rejected the input (${response.status})`)),
      };
    }

    const parsed = parseInferenceOutput(payload);
    if (!parsed.ok) {
      return { ok: false, error: new ModelError(parsed.message, 'MALFORMED_OUTPUT') };
    }
    return { ok: true, output: parsed.value };
  }
}
