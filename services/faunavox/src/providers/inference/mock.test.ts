import { describe, expect, it } from 'vitest';
import { ModelError } from '../../core/errors.js';
import { MockInferenceBackend } from './mock.js';

const audio = { sampleRate: 8000, samples: new Float32Array(8000) };

describe('MockInferenceBackend', () => {
  const backend = new MockInferenceBackend({ confidence: 0.9, latencyMs: 0 });

  it('answers with the species default tags', async () => {
    const result = await backend.infer({
      jobId: 'job-1',
      species: 'corvus_brachyrhynchos',
      audio,
      signal: new AbortController().signal,
    });

    expect(result).toEqual({
      ok: true,
      output: {
        translation: 'Simulated american crow vocalization (1.0s): alarm_call',
        tags: ['alarm_call'],
        confidence: 0.9,
      },
    });
  });

  it('refuses species it has no model for', async () => {
    const result = await backend.infer({
      jobId: 'job-1',
      species: 'felis_catus',
      audio,
      signal: new AbortController().signal,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ModelError);
    expect(result.error.code).toBe('UNSUPPORTED_SPECIES');
  });
});
