import { setTimeout as sleep } from 'node:timers/promises';
import { IN_PROGRESS_JOB_STATES, type JobStatus, type JobStatusPort } from './ports/job-status.port';

export interface PollJobOptions {
  initialIntervalMs?: number;
  maxIntervalMs?: number;
  maxDurationMs?: number;
  now?: () => number;
  wait?: (ms: number) => Promise<unknown>;
}

const DEFAULT_POLL_OPTIONS = {
  initialIntervalMs: 100,
  maxIntervalMs: 5_000,
  maxDurationMs: 20_000,
} as const;

/**
 * Polls a job until it leaves `queued`/`processing`, doubling the interval
 * between polls. Once the time budget is spent the last observed status is
 * returned, which may still be in progress.
 */
export async function pollJobUntilComplete(
  jobs: Pick<JobStatusPort, 'getJob'>,
  jobId: string,
  options: PollJobOptions = {},
): Promise<JobStatus> {
  const maxIntervalMs = options.maxIntervalMs ?? DEFAULT_POLL_OPTIONS.maxIntervalMs;
  const maxDurationMs = options.maxDurationMs ?? DEFAULT_POLL_OPTIONS.maxDurationMs;
  const now = options.now ?? (() => performance.now());
  const wait = options.wait ?? ((ms: number) => sleep(ms));

  let intervalMs = options.initialIntervalMs ?? DEFAULT_POLL_OPTIONS.initialIntervalMs;
  const startedAt = now();

  for (;;) {
    const job = await jobs.getJob(jobId);

    if (!IN_PROGRESS_JOB_STATES.has(job.status)) {
      return job;
    }

    if (now() - startedAt >= maxDurationMs) {
      return job;
    }

    await wait(intervalMs);
    intervalMs = Math.min(intervalMs * 2, maxIntervalMs);
  }
}
