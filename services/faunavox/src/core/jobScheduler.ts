import { randomUUID } from 'crypto';
import type { JobQueue } from '../queue/types.js';
import type { AnalysisJobRecord, DecodedAudio, InferenceOutput } from '../types/analysis.js';
import type { InferenceBackend, InferenceResult } from '../types/inference.js';
import type { AnalysisStore, CreateJobOutcome } from './analysisStore.js';
import { type BackoffPolicy, nextDelay, sleep } from './backoff.js';
import {
  type FaunavoxError,
  InferenceUnavailableError,
  JobCancelledError,
  JobTimeoutError,
  ModelError,
  errorMessage,
} from './errors.js';
import type { LeaseTable } from './leaseTable.js';

export interface SchedulerOptions {
  /** Retries after the first attempt for transient inference failures. */
  maxRetries: number;
  /** Wall-clock budget for one dispatch, covering every attempt and backoff. */
  jobTimeoutMs: number;
  backoff: BackoffPolicy;
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  maxRetries: 3,
  jobTimeoutMs: 120_000,
  backoff: { baseDelayMs: 500, maxDelayMs: 8_000 },
};

export type DispatchOutcome =
  | { kind: 'output'; output: InferenceOutput; attempt: number }
  | { kind: 'error'; error: FaunavoxError; attempt: number }
  | { kind: 'abandoned'; attempt: number; reason: string };

type Settled = { kind: 'settled'; value: InferenceResult } | { kind: 'aborted' };

interface SchedulerDeps {
  store: AnalysisStore;
  queue: JobQueue;
  leases: LeaseTable;
  backend: InferenceBackend;
  options?: SchedulerOptions;
  now?: () => Date;
}

function validateOutput(output: InferenceOutput): ModelError | null {
  if (!Number.isFinite(output.confidence) || output.confidence < 0 || output.confidence > 1) {
    return new ModelError(`Model reported confidence ${output.confidence} outside [0, 1]`, 'MALFORMED_OUTPUT');
  }
  return null;
}

/**
 * Admission and dispatch. `submit` is the only place jobs are created and
 * runs under the artifact's lease; `dispatch` is what a worker task executes
 * for a job already moved to `dispatched`.
 */
export class JobScheduler {
  private readonly store: AnalysisStore;
  private readonly queue: JobQueue;
  private readonly leases: LeaseTable;
  private readonly backend: InferenceBackend;
  private readonly options: SchedulerOptions;
  private readonly now: () => Date;
  private readonly inFlight = new Map<string, AbortController>();

  constructor(deps: SchedulerDeps) {
    this.store = deps.store;
    this.queue = deps.queue;
    this.leases = deps.leases;
    this.backend = deps.backend;
    this.options = deps.options ?? DEFAULT_SCHEDULER_OPTIONS;
    this.now = deps.now ?? (() => new Date());
  }

  get backendName(): string {
    return this.backend.name;
  }

  async submit(artifactId: string): Promise<CreateJobOutcome> {
    return this.leases.withLease(artifactId, () =>
      this.store.createJobIfIdle(artifactId, randomUUID(), this.now().toISOString()),
    );
  }

  async enqueue(jobId: string): Promise<void> {
    await this.queue.enqueue(jobId);
  }

  /** Signals an in-flight dispatch in this process to stop. */
  cancel(jobId: string): boolean {
    const controller = this.inFlight.get(jobId);
    if (!controller) return false;
    controller.abort(new JobCancelledError());
    return true;
  }

  isInFlight(jobId: string): boolean {
    return this.inFlight.has(jobId);
  }

  async dispatch(job: AnalysisJobRecord, species: string, audio: DecodedAudio): Promise<DispatchOutcome> {
    const controller = new AbortController();
    const { signal } = controller;
    this.inFlight.set(job.id, controller);
    const deadline = setTimeout(() => {
      controller.abort(new JobTimeoutError(this.options.jobTimeoutMs));
    }, this.options.jobTimeoutMs);

    let attempts = job.attempts;
    try {
      for (;;) {
        const next = await this.store.beginAttempt(job.id, attempts, this.now().toISOString());
        if (next === null) {
          return { kind: 'abandoned', attempt: attempts, reason: 'job is no longer dispatched' };
        }
        attempts = next;

        const settled = await this.race(
          Promise.resolve().then(() => this.backend.infer({ jobId: job.id, species, audio, signal })),
          signal,
        );
        if (settled.kind === 'aborted') {
          return this.aborted(signal, attempts);
        }

        const result = settled.value;
        if (result.ok) {
          const invalid = validateOutput(result.output);
          if (invalid) return { kind: 'error', error: invalid, attempt: attempts };
          return { kind: 'output', output: result.output, attempt: attempts };
        }

        if (result.error instanceof ModelError || attempts > this.options.maxRetries) {
          return { kind: 'error', error: result.error, attempt: attempts };
        }

        const delay = nextDelay(attempts, this.options.backoff);
        console.warn(
          `[faunavox] job_id=${job.id} attempt=${attempts} inference_unavailable retry_in_ms=${delay} error=${result.error.message}`,
        );
        await sleep(delay, signal);
        if (signal.aborted) {
          return this.aborted(signal, attempts);
        }
      }
    } finally {
      clearTimeout(deadline);
      this.inFlight.delete(job.id);
    }
  }

  private aborted(signal: AbortSignal, attempts: number): DispatchOutcome {
    const reason: unknown = signal.reason;
    if (reason instanceof JobTimeoutError) {
      return { kind: 'error', error: reason, attempt: attempts };
    }
    return { kind: 'abandoned', attempt: attempts, reason: errorMessage(reason, 'aborted') };
  }

  /**
   * Settles with the backend's answer or with `aborted`, whichever comes
   * first. A backend that ignores the signal keeps running, but its late
   * answer goes nowhere.
   */
  private race(pending: Promise<InferenceResult>, signal: AbortSignal): Promise<Settled> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve({ kind: 'aborted' });
        return;
      }
      const onAbort = () => resolve({ kind: 'aborted' });
      signal.addEventListener('abort', onAbort, { once: true });

      pending.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve({ kind: 'settled', value });
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          resolve({
            kind: 'settled',
            value: {
              ok: false,
              error: new InferenceUnavailableError(errorMessage(error, 'Inference backend threw')),
            },
          });
        },
      );
    });
  }
}
