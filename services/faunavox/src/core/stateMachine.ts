import type { PipelineStatus, TerminalStatus } from '../types/analysis.js';

/**
 * Forward-only lifecycle of an analysis job.
 *
 * - uploaded → quality_checked once QC has run
 * - quality_checked → rejected (unusable input) or dispatched (queued for inference)
 * - dispatched → succeeded | partial | failed
 * - uploaded / quality_checked → failed (cancellation, undecodable audio, queue outage)
 */
export const VALID_TRANSITIONS: Readonly<
  Record<PipelineStatus, ReadonlyArray<PipelineStatus>>
> = {
  uploaded: ['quality_checked', 'failed'],
  quality_checked: ['rejected', 'dispatched', 'failed'],
  dispatched: ['succeeded', 'partial', 'failed'],
  rejected: [],
  succeeded: [],
  partial: [],
  failed: [],
};

export const TERMINAL_STATUSES: ReadonlyArray<TerminalStatus> = [
  'rejected',
  'succeeded',
  'partial',
  'failed',
];

export function canTransition(from: PipelineStatus, to: PipelineStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: PipelineStatus): status is TerminalStatus {
  return VALID_TRANSITIONS[status].length === 0;
}

export function assertTransition(from: PipelineStatus, to: PipelineStatus): void {
  if (!canTransition(from, to)) {
    throw new Error(`Invalid job transition ${from} -> ${to}`);
  }
}
