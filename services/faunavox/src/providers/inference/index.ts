import { config } from '../../config.js';
import type { InferenceBackend } from '../../types/inference.js';
import { HttpInferenceBackend } from './http.js';
import { MockInferenceBackend } from './mock.js';

export function createInferenceBackend(): InferenceBackend {
  if (config.inferenceBackend === 'http') {
    return new HttpInferenceBackend({
      baseUrl: config.inferenceUrl,
      apiKey: config.inferenceApiKey || undefined,
    });
  }

  return new MockInferenceBackend({
    confidence: config.mockConfidence,
    latencyMs: config.mockLatencyMs,
  });
}
