import { randomUUID } from 'crypto';
import type { ArtifactStorage } from '../providers/storage/types.js';
import {
  AUDIO_FORMATS,
  type AnalysisJobRecord,
  type AnalysisReport,
  type AudioArtifactRecord,
  type AudioFormat,
  type DecodedAudio,
  type JobError,
  type JobHandle,
  type PipelineStatus,
  type QualityVerdict,
  type ResultLookup,
  type SpeciesInfo,
  type UploadInput,
} from '../types/analysis.js';
import type { AnalysisStore } from './analysisStore.js';
import type { AudioDecoder } from './audioDecoder.js';
import type { ArtifactCipher } from './encryption.js';
import {
  AudioDecodeError,
  EmptyUploadError,
  FaunavoxError,
  FileTooLargeError,
  JobCancelledError,
  NotFoundError,
  UnsupportedFormatError,
  UnsupportedSpeciesError,
  errorMessage,
} from './errors.js';
import type { JobScheduler } from './jobScheduler.js';
import type { LeaseTable } from './leaseTable.js';
import { DEFAULT_QUALITY_POLICY, type QualityPolicy, assessQuality } from './qualityControl.js';
import { DEFAULT_ACCURACY_FLOOR, type InferenceOutcome, type Reconciliation, reconcile } from './resultAggregator.js';
import { SUPPORTED_SPECIES, isSupportedSpecies } from './species.js';
import { isTerminal } from './stateMachine.js';

export const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export interface PipelineOptions {
  maxUploadBytes: number;
  accuracyFloor: number;
  quality: QualityPolicy;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
  accuracyFloor: DEFAULT_ACCURACY_FLOOR,
  quality: DEFAULT_QUALITY_POLICY,
};

interface PipelineDeps {
  store: AnalysisStore;
  storage: ArtifactStorage;
  cipher: ArtifactCipher;
  decoder: AudioDecoder;
  scheduler: JobScheduler;
  leases: LeaseTable;
  options?: PipelineOptions;
  now?: () => Date;
}

interface CommitInput {
  job: AnalysisJobRecord;
  from: PipelineStatus;
  expectedAttempts?: number;
  verdict: QualityVerdict | null;
  reconciliation: Reconciliation;
  finalizedAt: string;
}

function isAudioFormat(value: string): value is AudioFormat {
  return AUDIO_FORMATS.some((format) => format === value);
}

export function storageKeyFor(species: string, artifactId: string, format: AudioFormat): string {
  return `audio/${species}/${artifactId}.${format}`;
}

function toHandle(job: AnalysisJobRecord, deduplicated: boolean): JobHandle {
  return {
    job_id: job.id,
    artifact_id: job.artifact_id,
    status: job.status,
    attempts: job.attempts,
    deduplicated,
  };
}

function toJobError(error: unknown, fallbackCode: string): JobError {
  if (error instanceof FaunavoxError) {
    return { code: error.code, message: error.message };
  }
  return { code: fallbackCode, message: errorMessage(error, 'Unknown error') };
}

/**
 * Per-artifact lifecycle: upload, quality gate, dispatch and commit of the
 * terminal report. Only this class moves jobs between states.
 */
export class AnalysisPipeline {
  private readonly store: AnalysisStore;
  private readonly storage: ArtifactStorage;
  private readonly cipher: ArtifactCipher;
  private readonly decoder: AudioDecoder;
  private readonly scheduler: JobScheduler;
  private readonly leases: LeaseTable;
  private readonly options: PipelineOptions;
  private readonly now: () => Date;

  constructor(deps: PipelineDeps) {
    this.store = deps.store;
    this.storage = deps.storage;
    this.cipher = deps.cipher;
    this.decoder = deps.decoder;
    this.scheduler = deps.scheduler;
    this.leases = deps.leases;
    this.options = deps.options ?? DEFAULT_PIPELINE_OPTIONS;
    this.now = deps.now ?? (() => new Date());
  }

  listSupportedSpecies(): SpeciesInfo[] {
    return SUPPORTED_SPECIES.map((species) => ({ ...species, default_tags: [...species.default_tags] }));
  }

  listSupportedFormats(): AudioFormat[] {
    return [...AUDIO_FORMATS];
  }

  async upload(input: UploadInput): Promise<AudioArtifactRecord> {
    if (!isSupportedSpecies(input.species)) {
      throw new UnsupportedSpeciesError(input.species);
    }
    const format = input.format.trim().toLowerCase();
    if (!isAudioFormat(format)) {
      throw new UnsupportedFormatError(input.format, AUDIO_FORMATS);
    }
    if (input.bytes.byteLength === 0) {
      throw new EmptyUploadError();
    }
    if (input.bytes.byteLength > this.options.maxUploadBytes) {
      throw new FileTooLargeError(input.bytes.byteLength, this.options.maxUploadBytes);
    }

    const id = randomUUID();
    const storageKey = storageKeyFor(input.species, id, format);
    await this.storage.put(storageKey, this.cipher.encrypt(input.bytes));

    const record: AudioArtifactRecord = {
      id,
      owner_id: input.ownerId,
      species: input.species,
      format,
      size_bytes: input.bytes.byteLength,
      storage_key: storageKey,
      uploaded_at: this.now().toISOString(),
      status: 'uploaded',
      original_filename: input.originalFilename,
      location: input.location,
      recorded_at: input.recordedAt,
    };

    try {
      await this.store.createArtifact(record);
    } catch (error) {
      await this.storage.delete(storageKey).catch((cleanupError: unknown) => {
        console.error(`[faunavox] artifact_id=${id} orphaned_blob_cleanup_failed key=${storageKey}`, cleanupError);
      });
      throw error;
    }

    console.log(
      `[faunavox] artifact_id=${id} uploaded species=${record.species} format=${format} size_bytes=${record.size_bytes}`,
    );
    return record;
  }

  async getArtifact(artifactId: string): Promise<AudioArtifactRecord> {
    const artifact = await this.store.getArtifact(artifactId);
    if (!artifact) {
      throw new NotFoundError(`Artifact ${artifactId} not found`);
    }
    return artifact;
  }

  async getJob(jobId: string): Promise<AnalysisJobRecord> {
    const job = await this.store.getJob(jobId);
    if (!job) {
      throw new NotFoundError(`Job ${jobId} not found`);
    }
    return job;
  }

  /**
   * Admits a job for the artifact and runs the quality gate inline. Usable
   * audio is left `dispatched` on the queue; unusable audio is committed as
   * `rejected` before this returns.
   */
  async triggerAnalysis(artifactId: string): Promise<JobHandle> {
    const artifact = await this.getArtifact(artifactId);

    const active = await this.store.findActiveJob(artifactId);
    if (active) {
      return toHandle(active, true);
    }

    // fetched before admission so a storage outage leaves no job behind
    const ciphertext = await this.storage.get(artifact.storage_key);

    const submitted = await this.scheduler.submit(artifactId);
    if (!submitted.created) {
      return toHandle(submitted.job, true);
    }
    const job = submitted.job;
    console.log(`[faunavox] job_id=${job.id} artifact_id=${artifactId} status=uploaded`);

    try {
      return await this.gate(artifact, job, ciphertext);
    } catch (error) {
      return toHandle(await this.recover(job, error), false);
    }
  }

  /** Decode, quality gate and enqueue for a freshly admitted job. */
  private async gate(artifact: AudioArtifactRecord, job: AnalysisJobRecord, ciphertext: Buffer): Promise<JobHandle> {
    const artifactId = artifact.id;

    let audio: DecodedAudio;
    try {
      audio = await this.decode(artifact, ciphertext);
    } catch (error) {
      return toHandle(await this.fail(job, 'uploaded', toJobError(error, 'AUDIO_DECODE_FAILED')), false);
    }

    const verdict = assessQuality(artifactId, audio, this.options.quality);
    const checked = await this.store.transition({
      jobId: job.id,
      from: 'uploaded',
      to: 'quality_checked',
      quality: verdict,
      now: this.now().toISOString(),
    });
    if (!checked) {
      return toHandle(await this.currentJob(job), false);
    }
    console.log(
      `[faunavox] job_id=${job.id} status=quality_checked usable=${verdict.usable} score=${verdict.score} flags=${verdict.flags.join(',') || 'none'}`,
    );

    if (!verdict.usable) {
      const finalizedAt = this.now().toISOString();
      const committed = await this.commit({
        job: checked,
        from: 'quality_checked',
        verdict,
        reconciliation: reconcile({ jobId: job.id, verdict, outcome: null, finalizedAt }),
        finalizedAt,
      });
      return toHandle(committed ?? (await this.currentJob(job)), false);
    }

    const dispatched = await this.store.transition({
      jobId: job.id,
      from: 'quality_checked',
      to: 'dispatched',
      now: this.now().toISOString(),
    });
    if (!dispatched) {
      return toHandle(await this.currentJob(job), false);
    }

    try {
      await this.scheduler.enqueue(job.id);
    } catch (error) {
      console.error(`[faunavox] job_id=${job.id} enqueue_failed`, error);
      const failed = await this.fail(dispatched, 'dispatched', toJobError(error, 'QUEUE_UNAVAILABLE'), 0);
      return toHandle(failed, false);
    }

    console.log(`[faunavox] job_id=${job.id} status=dispatched`);
    return toHandle(dispatched, false);
  }

  /**
   * Worker entry point for one queued job id. Jobs that are no longer
   * `dispatched` (cancelled, or finished by another worker) are skipped.
   */
  async processJob(jobId: string): Promise<void> {
    const job = await this.store.getJob(jobId);
    if (!job || job.status !== 'dispatched') {
      console.log(`[faunavox] job_id=${jobId} skipped status=${job?.status ?? 'missing'}`);
      return;
    }

    try {
      await this.runDispatched(job);
    } catch (error) {
      await this.recover(job, error);
    }
  }

  private async runDispatched(job: AnalysisJobRecord): Promise<void> {
    const jobId = job.id;
    const verdict = job.quality;
    const artifact = await this.store.getArtifact(job.artifact_id);
    if (!artifact || !verdict) {
      await this.fail(
        job,
        'dispatched',
        { code: 'INCONSISTENT_JOB', message: 'Dispatched job is missing its artifact or quality verdict' },
        job.attempts,
      );
      return;
    }

    let audio: DecodedAudio;
    try {
      audio = await this.decode(artifact, await this.storage.get(artifact.storage_key));
    } catch (error) {
      await this.fail(job, 'dispatched', toJobError(error, 'AUDIO_DECODE_FAILED'), job.attempts);
      return;
    }

    const outcome = await this.scheduler.dispatch(job, artifact.species, audio);
    if (outcome.kind === 'abandoned') {
      console.log(`[faunavox] job_id=${jobId} abandoned attempts=${outcome.attempt} reason=${outcome.reason}`);
      return;
    }

    const inference: InferenceOutcome =
      outcome.kind === 'output' ? { kind: 'output', output: outcome.output } : { kind: 'error', error: outcome.error };
    const finalizedAt = this.now().toISOString();
    const committed = await this.commit({
      job: { ...job, attempts: outcome.attempt },
      from: 'dispatched',
      expectedAttempts: outcome.attempt,
      verdict,
      reconciliation: reconcile({
        jobId,
        verdict,
        outcome: inference,
        accuracyFloor: this.options.accuracyFloor,
        finalizedAt,
      }),
      finalizedAt,
    });

    if (!committed) {
      console.log(`[faunavox] job_id=${jobId} stale_result_discarded attempts=${outcome.attempt}`);
    }
  }

  /**
   * Moves a non-terminal job to `failed` with code CANCELLED and aborts its
   * in-flight dispatch. Cancelling a terminal job returns it unchanged.
   */
  async cancelJob(jobId: string): Promise<AnalysisJobRecord> {
    const job = await this.getJob(jobId);

    return this.leases.withLease(job.artifact_id, async () => {
      const current = await this.getJob(jobId);
      if (isTerminal(current.status)) {
        return current;
      }

      const cancelled = new JobCancelledError();
      const failed = await this.fail(current, current.status, { code: cancelled.code, message: cancelled.message });
      const aborted = this.scheduler.cancel(jobId);
      console.log(`[faunavox] job_id=${jobId} cancelled from=${current.status} in_flight=${aborted}`);
      return failed;
    });
  }

  async getResult(artifactId: string): Promise<ResultLookup> {
    const artifact = await this.store.getArtifact(artifactId);
    if (!artifact) {
      return { state: 'not_found' };
    }

    const report = await this.store.getLatestReport(artifactId);
    if (report) {
      return { state: 'ready', report };
    }

    const latest = await this.store.findLatestJob(artifactId);
    return {
      state: 'not_ready',
      status: latest?.status ?? artifact.status,
      job_id: latest?.id ?? null,
    };
  }

  /**
   * Commits `failed` for a job whose processing threw outside the guarded
   * steps, so it never stays non-terminal. Throws if the store is still down.
   */
  private async recover(job: AnalysisJobRecord, error: unknown): Promise<AnalysisJobRecord> {
    console.error(`[faunavox] job_id=${job.id} processing_error error=${errorMessage(error, 'unknown error')}`, error);
    const current = await this.currentJob(job);
    if (isTerminal(current.status)) {
      return current;
    }
    return this.fail(current, current.status, toJobError(error, 'WORKER_ERROR'), current.attempts);
  }

  private async decode(artifact: AudioArtifactRecord, ciphertext: Buffer): Promise<DecodedAudio> {
    let plaintext: Buffer;
    try {
      plaintext = this.cipher.decrypt(ciphertext);
    } catch (error) {
      throw new AudioDecodeError(`Could not decrypt artifact: ${errorMessage(error, 'unknown cipher error')}`);
    }

    try {
      return await this.decoder.decode(plaintext, artifact.format);
    } catch (error) {
      if (error instanceof FaunavoxError) throw error;
      throw new AudioDecodeError(errorMessage(error, 'Audio could not be decoded'));
    }
  }

  private async fail(
    job: AnalysisJobRecord,
    from: PipelineStatus,
    error: JobError,
    expectedAttempts?: number,
  ): Promise<AnalysisJobRecord> {
    const finalizedAt = this.now().toISOString();
    const committed = await this.commit({
      job,
      from,
      expectedAttempts,
      verdict: job.quality,
      reconciliation: { status: 'failed', result: null, error },
      finalizedAt,
    });
    return committed ?? this.currentJob(job);
  }

  private async commit(input: CommitInput): Promise<AnalysisJobRecord | undefined> {
    const { job, reconciliation } = input;
    const report: AnalysisReport = {
      artifact_id: job.artifact_id,
      job_id: job.id,
      status: reconciliation.status,
      attempts: job.attempts,
      quality: input.verdict,
      result: reconciliation.result,
      error: reconciliation.error,
      finalized_at: input.finalizedAt,
    };

    const finalized = await this.store.finalize({
      jobId: job.id,
      from: input.from,
      expectedAttempts: input.expectedAttempts,
      report,
      result: reconciliation.result,
      error: reconciliation.error,
    });

    if (finalized) {
      const suffix = reconciliation.error ? ` error_code=${reconciliation.error.code}` : '';
      console.log(`[faunavox] job_id=${job.id} status=${report.status} attempts=${report.attempts}${suffix}`);
    }
    return finalized;
  }

  private async currentJob(job: AnalysisJobRecord): Promise<AnalysisJobRecord> {
    return (await this.store.getJob(job.id)) ?? job;
  }
}
