import type {
  AnalysisJobRecord,
  AnalysisReport,
  AudioArtifactRecord,
} from '../types/analysis.js';
import type {
  AnalysisStore,
  CreateJobOutcome,
  FinalizeInput,
  JobStats,
  TransitionInput,
} from './analysisStore.js';
import { assertTransition, isTerminal } from './stateMachine.js';

/**
 * Process-local job table. Each method runs synchronously between awaits,
 * which makes every guarded write atomic within one Node.js process.
 */
export class MemoryAnalysisStore implements AnalysisStore {
  readonly name = 'memory';
  private readonly artifacts = new Map<string, AudioArtifactRecord>();
  private readonly jobs = new Map<string, AnalysisJobRecord>();
  private readonly jobsByArtifact = new Map<string, string[]>();
  private readonly reports = new Map<string, AnalysisReport>();

  async createArtifact(record: AudioArtifactRecord): Promise<void> {
    if (this.artifacts.has(record.id)) {
      throw new Error(`Artifact ${record.id} already exists`);
    }
    this.artifacts.set(record.id, structuredClone(record));
  }

  async getArtifact(id: string): Promise<AudioArtifactRecord | undefined> {
    const artifact = this.artifacts.get(id);
    return artifact ? structuredClone(artifact) : undefined;
  }

  async createJobIfIdle(artifactId: string, jobId: string, now: string): Promise<CreateJobOutcome> {
    const active = this.activeJob(artifactId);
    if (active) {
      return { job: structuredClone(active), created: false };
    }

    const job: AnalysisJobRecord = {
      id: jobId,
      artifact_id: artifactId,
      status: 'uploaded',
      attempts: 0,
      created_at: now,
      updated_at: now,
      quality: null,
      error: null,
      finalized_at: null,
    };
    this.jobs.set(jobId, job);
    this.jobsByArtifact.set(artifactId, [...(this.jobsByArtifact.get(artifactId) ?? []), jobId]);
    this.mirrorStatus(job);
    return { job: structuredClone(job), created: true };
  }

  async getJob(id: string): Promise<AnalysisJobRecord | undefined> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : undefined;
  }

  async findActiveJob(artifactId: string): Promise<AnalysisJobRecord | undefined> {
    const active = this.activeJob(artifactId);
    return active ? structuredClone(active) : undefined;
  }

  async findLatestJob(artifactId: string): Promise<AnalysisJobRecord | undefined> {
    const ids = this.jobsByArtifact.get(artifactId) ?? [];
    const latest = ids.length > 0 ? this.jobs.get(ids[ids.length - 1]) : undefined;
    return latest ? structuredClone(latest) : undefined;
  }

  async transition(input: TransitionInput): Promise<AnalysisJobRecord | undefined> {
    assertTransition(input.from, input.to);
    const job = this.jobs.get(input.jobId);
    if (!job || job.status !== input.from) return undefined;

    job.status = input.to;
    job.updated_at = input.now;
    if (input.quality) job.quality = structuredClone(input.quality);
    this.mirrorStatus(job);
    return structuredClone(job);
  }

  async beginAttempt(jobId: string, expectedAttempts: number, now: string): Promise<number | null> {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'dispatched' || job.attempts !== expectedAttempts) return null;

    job.attempts += 1;
    job.updated_at = now;
    return job.attempts;
  }

  async finalize(input: FinalizeInput): Promise<AnalysisJobRecord | undefined> {
    assertTransition(input.from, input.report.status);
    const job = this.jobs.get(input.jobId);
    if (!job || job.status !== input.from) return undefined;
    if (input.expectedAttempts !== undefined && job.attempts !== input.expectedAttempts) return undefined;

    const { report } = input;
    job.status = report.status;
    job.error = input.error ? { ...input.error } : null;
    job.quality = report.quality ? structuredClone(report.quality) : job.quality;
    job.updated_at = report.finalized_at;
    job.finalized_at = report.finalized_at;
    this.reports.set(job.id, structuredClone(report));
    this.mirrorStatus(job);
    return structuredClone(job);
  }

  async getLatestReport(artifactId: string): Promise<AnalysisReport | undefined> {
    const ids = this.jobsByArtifact.get(artifactId) ?? [];
    for (let index = ids.length - 1; index >= 0; index -= 1) {
      const report = this.reports.get(ids[index]);
      if (report) return structuredClone(report);
    }
    return undefined;
  }

  async stats(): Promise<JobStats> {
    const counts: JobStats = {
      total: 0,
      uploaded: 0,
      quality_checked: 0,
      rejected: 0,
      dispatched: 0,
      succeeded: 0,
      partial: 0,
      failed: 0,
    };
    for (const job of this.jobs.values()) {
      counts.total += 1;
      counts[job.status] += 1;
    }
    return counts;
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private activeJob(artifactId: string): AnalysisJobRecord | undefined {
    const ids = this.jobsByArtifact.get(artifactId) ?? [];
    for (const id of ids) {
      const job = this.jobs.get(id);
      if (job && !isTerminal(job.status)) return job;
    }
    return undefined;
  }

  private mirrorStatus(job: AnalysisJobRecord): void {
    const artifact = this.artifacts.get(job.artifact_id);
    if (artifact) artifact.status = job.status;
  }
}
