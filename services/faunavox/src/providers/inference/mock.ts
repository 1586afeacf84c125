import { sleep } from '../../core/backoff.js';
import { ModelError } from '../../core/errors.js';
import { getSpecies } from '../../core/species.js';
import type { InferenceBackend, InferenceRequest, InferenceResult } from '../../types/inference.js';

export interface MockInferenceOptions {
  confidence: number;
  latencyMs: number;
}

/**
 * Deterministic stand-in model: species default tags, a fixed confidence,
 * and a canned translation. Useful for local runs without a model service.
 */
export class MockInferenceBackend implements InferenceBackend {
  readonly name = 'mock';

  constructor(private readonly options: MockInferenceOptions = { confidence: 0.85, latencyMs: 250 }) {}

  async infer(request: InferenceRequest): Promise<InferenceResult> {
    await sleep(this.options.latencyMs, request.signal);

    const species = getSpecies(request.species);
    if (!species) {
      return { ok: false, error: new ModelError(`No model for species ${request.species}`, 'UNSUPPORTED_SPECIES') };
    }

    const seconds = (request.audio.samples.length / request.audio.sampleRate).toFixed(1);
    return {
      ok: true,
      output: {
        translation: `Simulated ${species.common_name.toLowerCase()} vocalization (${seconds}s): ${species.default_tags.join(', ')}`,
        tags: [...species.default_tags],
        confidence: this.options.confidence,
      },
    };
  }
}
