export const ANALYSIS_QUEUE_NAME = 'faunavox-analysis';

export interface AnalysisQueuePayload {
  jobId: string;
}
