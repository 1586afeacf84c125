import type {
  AnalysisResult,
  InferenceOutput,
  JobError,
  QualityVerdict,
  TerminalStatus,
} from '../types/analysis.js';
import { type FaunavoxError, QualityRejectedError } from './errors.js';

export const DEFAULT_ACCURACY_FLOOR = 0.8;

export type InferenceOutcome =
  | { kind: 'output'; output: InferenceOutput }
  | { kind: 'error'; error: FaunavoxError };

export interface Reconciliation {
  status: TerminalStatus;
  result: AnalysisResult | null;
  error: JobError | null;
}

function toJobError(error: FaunavoxError): JobError {
  return { code: error.code, message: error.message };
}

/**
 * Decides the terminal state of a job from its verdict and inference
 * outcome. Persists nothing; the orchestrator commits what it returns.
 */
export function reconcile(params: {
  jobId: string;
  verdict: QualityVerdict;
  outcome: InferenceOutcome | null;
  accuracyFloor?: number;
  finalizedAt: string;
}): Reconciliation {
  const { verdict, outcome } = params;
  const floor = params.accuracyFloor ?? DEFAULT_ACCURACY_FLOOR;

  if (!verdict.usable) {
    return {
      status: 'rejected',
      result: null,
      error: toJobError(new QualityRejectedError(verdict.flags)),
    };
  }

  if (!outcome) {
    throw new Error(`Usable audio for job ${params.jobId} reached reconciliation without an inference outcome`);
  }

  if (outcome.kind === 'error') {
    return { status: 'failed', result: null, error: toJobError(outcome.error) };
  }

  const { output } = outcome;
  const degraded = output.confidence < floor || verdict.flags.length > 0;

  return {
    status: degraded ? 'partial' : 'succeeded',
    result: {
      job_id: params.jobId,
      translation: output.translation,
      tags: [...new Set(output.tags)],
      confidence: output.confidence,
      quality: verdict,
      partial: degraded,
      finalized_at: params.finalizedAt,
    },
    error: null,
  };
}
