export const JOB_STATUS_PORT = Symbol('JOB_STATUS_PORT');

export type JobState = 'queued' | 'processing' | 'succeeded' | 'failed' | 'timeout';

export const IN_PROGRESS_JOB_STATES: ReadonlySet<JobState> = new Set(['queued', 'processing']);

export interface JobStatus {
  id: string;
  status: JobState;
  errorCode?: string;
  errorMsg?: string;
}

export interface JobStatusUpdate {
  status: JobState;
  errorCode?: string;
  errorMsg?: string;
}

export interface JobStatusPort {
  getJob(jobId: string): Promise<JobStatus>;
  updateJob(jobId: string, update: JobStatusUpdate): Promise<void>;
}
