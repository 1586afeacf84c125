import type { FaunavoxHttpClient } from './client.js';
import type { AnalysisJob, RequestOptions } from './types.js';

export class JobsResource {
  constructor(private readonly client: FaunavoxHttpClient) {}

  retrieve(jobId: string, options?: RequestOptions): Promise<AnalysisJob> {
    return this.client.request<AnalysisJob>({
      method: 'GET',
      path: `/v1/jobs/${encodeURIComponent(jobId)}`,
      options,
    });
  }

  /** Cancelling a finished job is a no-op that returns it unchanged. */
  cancel(jobId: string, options?: RequestOptions): Promise<AnalysisJob> {
    return this.client.request<AnalysisJob>({
      method: 'POST',
      path: `/v1/jobs/${encodeURIComponent(jobId)}/cancel`,
      options,
    });
  }
}
