export type AudioFormat = 'wav' | 'mp3' | 'flac';

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

export interface FaunavoxClientConfig {
  baseUrl?: string;
  /** Sent as `x-caller-id`; the gateway in front of the service normally sets it. */
  callerId?: string;
  /** Operator key sent as `x-api-key` when the deployment enables the gate. */
  apiKey?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
  callerId?: string;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface SpeciesInfo {
  id: string;
  common_name: string;
  default_tags: string[];
}

export interface SpeciesListResponse {
  species: SpeciesInfo[];
  count: number;
}

export interface FormatsResponse {
  formats: AudioFormat[];
  max_upload_bytes: number;
}

export interface UploadParams {
  audio: Uint8Array;
  species: string;
  format: AudioFormat;
  filename?: string;
  location?: string;
  recorded_at?: string;
}

export interface AudioArtifact {
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

export interface UploadResponse extends AudioArtifact {
  analysis_url: string;
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

export interface AnalysisJob {
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

export interface TriggerAnalysisResponse {
  job_id: string;
  artifact_id: string;
  status: PipelineStatus;
  attempts: number;
  deduplicated: boolean;
  poll_url: string;
  notice?: JobError;
}

export interface ResultPending {
  artifact_id: string;
  state: 'not_ready';
  status: PipelineStatus;
  job_id: string | null;
}

export type ResultResponse = { state: 'ready'; report: AnalysisReport } | ResultPending;

export interface WaitForResultOptions extends RequestOptions {
  /** Delay between polls. Defaults to 1000 ms. */
  intervalMs?: number;
  /** Gives up with a TimeoutError after this long. Defaults to 5 minutes. */
  timeoutMs?: number;
  /**
   * Job id from `trigger`. Reports of earlier jobs on the same artifact are
   * skipped until this job's report is stored.
   */
  jobId?: string;
}
