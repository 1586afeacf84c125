export type JobHandler = (jobId: string) => Promise<void>;

/**
 * Transport between admission and the inference worker pool. Payloads carry
 * only a job id; workers load everything else from the job-state table.
 */
export interface JobQueue {
  readonly backend: string;
  enqueue(jobId: string): Promise<void>;
  /** Starts consuming with the given handler. Called once per process. */
  start(handler: JobHandler): void;
  ping(): Promise<string>;
  close(): Promise<void>;
}
