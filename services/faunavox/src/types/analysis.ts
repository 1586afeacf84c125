export const AUDIO_FORMATS = ['wav', 'mp3', 'flac'] as const;
export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export type PipelineStatus =
  | 'uploaded'
  | 'quality_checked'
  | 'rejected'
  | 'dispatched'
  | 'succeeded'
  | 'partial'
  | 'failed';

export type TerminalStatus = 'rejected' | 'succeeded' | 'partial' | 'failed';

export type QualityFlag = 'noisy' | 'overlapping' | 'clipped' | 'too-short' | 'too-long';

export interface AudioArtifactRecord {
  id: string;
  owner_id: string;
  species: string;
  format: AudioFormat;
  size_bytes: number;
  storage_key: string;
  uploaded_at: string;
  status: PipelineStatus;
  original_filename?: string;
  location?: string;
  recorded_at?: string;
}

export interface QualityMetrics {
  duration_seconds: number;
  snr_db: number;
  clipping_ratio: number;
  overlap_ratio: number;
}

export interface QualityVerdict {
  artifact_id: string;
  flags: QualityFlag[];
  score: number;
  usable: boolean;
  metrics: QualityMetrics;
}

export interface JobError {
  code: string;
  message: string;
}

export interface AnalysisJobRecord {
  id: string;
  artifact_id: string;
  status: PipelineStatus;
  attempts: number;
  created_at: string;
  updated_at: string;
  quality: QualityVerdict | null;
  error: JobError | null;
  finalized_at: string | null;
}

export interface AnalysisResult {
  job_id: string;
  translation: string | null;
  tags: string[];
  confidence: number;
  quality: QualityVerdict;
  partial: boolean;
  finalized_at: string;
}

/**
 * What `get_result` hands back for a terminal job. `result` is only present
 * for `succeeded` and `partial`; `rejected` carries the verdict, `failed`
 * carries the error.
 */
export interface AnalysisReport {
  artifact_id: string;
  job_id: string;
  status: TerminalStatus;
  attempts: number;
  quality: QualityVerdict | null;
  result: AnalysisResult | null;
  error: JobError | null;
  finalized_at: string;
}

export interface JobHandle {
  job_id: string;
  artifact_id: string;
  status: PipelineStatus;
  attempts: number;
  deduplicated: boolean;
}

export type ResultLookup =
  | { state: 'ready'; report: AnalysisReport }
  | { state: 'not_ready'; status: PipelineStatus; job_id: string | null }
  | { state: 'not_found' };

export interface DecodedAudio {
  sampleRate: number;
  samples: Float32Array;
}

export interface InferenceOutput {
  translation: string | null;
  tags: string[];
  confidence: number;
}

export interface UploadInput {
  bytes: Buffer;
  format: string;
  species: string;
  ownerId: string;
  originalFilename?: string;
  location?: string;
  recordedAt?: string;
}

export interface SpeciesInfo {
  id: string;
  common_name: string;
  default_tags: string[];
}
