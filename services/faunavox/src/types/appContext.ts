import type { AnalysisStore } from '../core/analysisStore.js';
import type { AnalysisPipeline } from '../core/pipeline.js';
import type { ArtifactStorage } from '../providers/storage/types.js';
import type { JobQueue } from '../queue/types.js';
import type { InferenceBackend } from './inference.js';

export interface ServiceSettings {
  publicBaseUrl: string;
  gatewayKeyRequired: boolean;
  maxUploadBytes: number;
}

export interface AppContext {
  pipeline: AnalysisPipeline;
  store: AnalysisStore;
  storage: ArtifactStorage;
  queue: JobQueue;
  backend: InferenceBackend;
  settings: ServiceSettings;
}
