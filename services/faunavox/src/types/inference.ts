import type { InferenceUnavailableError, ModelError } from '../core/errors.js';
import type { DecodedAudio, InferenceOutput } from './analysis.js';

export interface InferenceRequest {
  jobId: string;
  species: string;
  audio: DecodedAudio;
  signal: AbortSignal;
}

export type InferenceFailure = InferenceUnavailableError | ModelError;

export type InferenceResult =
  | { ok: true; output: InferenceOutput }
  | { ok: false; error: InferenceFailure };

export interface InferenceBackend {
  readonly name: string;
  infer(request: InferenceRequest): Promise<InferenceResult>;
}
