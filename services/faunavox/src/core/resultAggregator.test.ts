import { describe, expect, it } from 'vitest';
import type { QualityVerdict } from '../types/analysis.js';
import { InferenceUnavailableError, ModelError } from './errors.js';
import { reconcile } from './resultAggregator.js';

const FINALIZED_AT = '2026-03-01T12:00:00.000Z';

function verdict(overrides: Partial<QualityVerdict> = {}): QualityVerdict {
  return {
    artifact_id: 'art-1',
    flags: [],
    score: 1,
    usable: true,
    metrics: { duration_seconds: 2, snr_db: 120, clipping_ratio: 0, overlap_ratio: 0 },
    ...overrides,
  };
}

function output(confidence: number, tags: string[] = ['alarm_call']) {
  return { kind: 'output' as const, output: { translation: 'predator overhead', tags, confidence } };
}

describe('reconcile', () => {
  it('succeeds at exactly the accuracy floor', () => {
    const reconciled = reconcile({ jobId: 'job-1', verdict: verdict(), outcome: output(0.8), finalizedAt: FINALIZED_AT });

    expect(reconciled.status).toBe('succeeded');
    expect(reconciled.result?.partial).toBe(false);
    expect(reconciled.error).toBeNull();
  });

  it('is partial just below the floor', () => {
    const reconciled = reconcile({ jobId: 'job-1', verdict: verdict(), outcome: output(0.79), finalizedAt: FINALIZED_AT });

    expect(reconciled.status).toBe('partial');
    expect(reconciled.result?.partial).toBe(true);
  });

  it('is partial when the verdict carries flags, whatever the confidence', () => {
    const flagged = verdict({ flags: ['noisy'], score: 0.2 });
    const reconciled = reconcile({ jobId: 'job-1', verdict: flagged, outcome: output(0.99), finalizedAt: FINALIZED_AT });

    expect(reconciled).toEqual({
      status: 'partial',
      result: {
        job_id: 'job-1',
        translation: 'predator overhead',
        tags: ['alarm_call'],
        confidence: 0.99,
        quality: flagged,
        partial: true,
        finalized_at: FINALIZED_AT,
      },
      error: null,
    });
  });

  it('honors a custom floor', () => {
    const reconciled = reconcile({
      jobId: 'job-1',
      verdict: verdict(),
      outcome: output(0.85),
      accuracyFloor: 0.9,
      finalizedAt: FINALIZED_AT,
    });
    expect(reconciled.status).toBe('partial');
  });

  it('dedupes tags in order', () => {
    const reconciled = reconcile({
      jobId: 'job-1',
      verdict: verdict(),
      outcome: output(0.9, ['alarm_call', 'mobbing', 'alarm_call']),
      finalizedAt: FINALIZED_AT,
    });
    expect(reconciled.result?.tags).toEqual(['alarm_call', 'mobbing']);
  });

  it('rejects unusable audio before looking at the outcome', () => {
    const reconciled = reconcile({
      jobId: 'job-1',
      verdict: verdict({ flags: ['too-short'], usable: false, score: 0 }),
      outcome: output(0.99),
      finalizedAt: FINALIZED_AT,
    });

    expect(reconciled).toEqual({
      status: 'rejected',
      result: null,
      error: { code: 'QUALITY_REJECTED', message: 'Audio failed quality control (too-short)' },
    });
  });

  it('fails with the inference error code', () => {
    expect(
      reconcile({
        jobId: 'job-1',
        verdict: verdict(),
        outcome: { kind: 'error', error: new ModelError('Unsupported call structure') },
        finalizedAt: FINALIZED_AT,
      }),
    ).toEqual({
      status: 'failed',
      result: null,
      error: { code: 'MODEL_ERROR', message: 'Unsupported call structure' },
    });

    expect(
      reconcile({
        jobId: 'job-1',
        verdict: verdict(),
        outcome: { kind: 'error', error: new InferenceUnavailableError() },
        finalizedAt: FINALIZED_AT,
      }).error?.code,
    ).toBe('INFERENCE_UNAVAILABLE');
  });

  it('refuses usable audio without an outcome', () => {
    expect(() => reconcile({ jobId: 'job-1', verdict: verdict(), outcome: null, finalizedAt: FINALIZED_AT })).toThrow(
      'reached reconciliation without an inference outcome',
    );
  });
});
