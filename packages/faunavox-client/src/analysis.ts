import type { FaunavoxHttpClient } from './client.js';
import { TimeoutError } from './errors.js';
import type {
  AnalysisReport,
  RequestOptions,
  ResultPending,
  ResultResponse,
  TriggerAnalysisResponse,
  WaitForResultOptions,
} from './types.js';

const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_WAIT_TIMEOUT_MS = 5 * 60 * 1000;

function isPending(body: AnalysisReport | ResultPending): body is ResultPending {
  return 'state' in body && body.state === 'not_ready';
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class AnalysisResource {
  constructor(private readonly client: FaunavoxHttpClient) {}

  /** Starts analysis, or returns the handle of the job already running. */
  trigger(artifactId: string, options?: RequestOptions): Promise<TriggerAnalysisResponse> {
    return this.client.request<TriggerAnalysisResponse>({
      method: 'POST',
      path: `/v1/artifacts/${encodeURIComponent(artifactId)}/analysis`,
      options,
    });
  }

  async result(artifactId: string, options?: RequestOptions): Promise<ResultResponse> {
    const body = await this.client.request<AnalysisReport | ResultPending>({
      method: 'GET',
      path: `/v1/artifacts/${encodeURIComponent(artifactId)}/result`,
      options,
    });
    return isPending(body) ? body : { state: 'ready', report: body };
  }

  /**
   * Polls `result` until a report is stored, or with `jobId` until that
   * job's report is.
   */
  async waitForResult(artifactId: string, options: WaitForResultOptions = {}): Promise<AnalysisReport> {
    const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const deadline = Date.now() + (options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS);

    for (;;) {
      const lookup = await this.result(artifactId, options);
      if (lookup.state === 'ready' && (!options.jobId || lookup.report.job_id === options.jobId)) {
        return lookup.report;
      }
      if (Date.now() + intervalMs > deadline) {
        const status = lookup.state === 'ready' ? `waiting for job ${options.jobId}` : lookup.status;
        throw new TimeoutError(`Analysis of artifact ${artifactId} still ${status} after waiting`);
      }
      await delay(intervalMs, options.signal);
    }
  }
}
