import type {
  AnalysisJobRecord,
  AnalysisReport,
  AnalysisResult,
  AudioArtifactRecord,
  JobError,
  PipelineStatus,
  QualityVerdict,
} from '../types/analysis.js';

export interface CreateJobOutcome {
  job: AnalysisJobRecord;
  created: boolean;
}

export interface TransitionInput {
  jobId: string;
  from: PipelineStatus;
  to: PipelineStatus;
  quality?: QualityVerdict;
  now: string;
}

export interface FinalizeInput {
  jobId: string;
  from: PipelineStatus;
  /** Commit token: when set, the write only lands if the job is still on this attempt. */
  expectedAttempts?: number;
  report: AnalysisReport;
  result: AnalysisResult | null;
  error: JobError | null;
}

export type JobStats = Record<PipelineStatus | 'total', number>;

/**
 * Job-state table plus artifact metadata. Every mutating call is guarded by
 * the job's current status, so a write based on a stale read is a no-op
 * that returns undefined/null instead of moving the job.
 */
export interface AnalysisStore {
  readonly name: string;

  createArtifact(record: AudioArtifactRecord): Promise<void>;
  getArtifact(id: string): Promise<AudioArtifactRecord | undefined>;

  /** Inserts a job in `uploaded` unless the artifact already has a non-terminal job. */
  createJobIfIdle(artifactId: string, jobId: string, now: string): Promise<CreateJobOutcome>;
  getJob(id: string): Promise<AnalysisJobRecord | undefined>;
  findActiveJob(artifactId: string): Promise<AnalysisJobRecord | undefined>;
  findLatestJob(artifactId: string): Promise<AnalysisJobRecord | undefined>;

  /** Non-terminal move; also mirrors the new status onto the artifact. */
  transition(input: TransitionInput): Promise<AnalysisJobRecord | undefined>;

  /** Bumps `attempts` from `expectedAttempts` while the job is dispatched; null if it no longer is. */
  beginAttempt(jobId: string, expectedAttempts: number, now: string): Promise<number | null>;

  /** Terminal move, result row and report written together or not at all. */
  finalize(input: FinalizeInput): Promise<AnalysisJobRecord | undefined>;

  getLatestReport(artifactId: string): Promise<AnalysisReport | undefined>;

  stats(): Promise<JobStats>;
  close(): Promise<void>;
}
