import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogLine, optionalString, settle } from '@queue-relay/shared';
import type { BrokerDelivery } from '../messaging/ports/broker-channels.port';
import type { QueueHandlerCallback } from '../queues/queue-handler-registry';
import {
  JOB_STATUS_PORT,
  type JobStatusPort,
  type JobStatusUpdate,
} from './ports/job-status.port';

const SERVICE_NAME = 'bot-service';
const DEFAULT_ERROR_CODE = 'BOT_ERROR';
const MAX_ERROR_MESSAGE_LENGTH = 300;

@Injectable()
export class JobStatusReporter {
  private readonly logger = new Logger(JobStatusReporter.name);

  constructor(
    @Inject(JOB_STATUS_PORT)
    private readonly jobs: JobStatusPort,
  ) {}

  /**
   * Best effort: a failed update is logged and dropped so that job reporting
   * never blocks message processing. The backend may briefly show a stale status.
   */
  async report(jobId: string, update: JobStatusUpdate): Promise<boolean> {
    const result = await settle(() => this.jobs.updateJob(jobId, update));
    if (!result.ok) {
      this.logger.warn(createJsonLogLine({
        level: 'warn',
        service: SERVICE_NAME,
        message: `Job status update to "${update.status}" failed.`,
        correlationId: jobId,
        jobId,
        error: result.error,
      }));
    }
    return result.ok;
  }

  /**
   * Reports processing/succeeded/failed around a queue callback, keyed by the
   * message correlation id. Exceptions from the callback are rethrown.
   */
  wrap<TPayload>(callback: QueueHandlerCallback<TPayload>): QueueHandlerCallback<TPayload> {
    return async (payload: TPayload, message: BrokerDelivery): Promise<void> => {
      const jobId = optionalString(message.properties.correlationId);
      if (!jobId) {
        await callback(payload, message);
        return;
      }

      await this.report(jobId, { status: 'processing' });
      try {
        await callback(payload, message);
      } catch (error) {
        await this.report(jobId, {
          status: 'failed',
          errorCode: readErrorCode(error),
          errorMsg: readErrorMessage(error).slice(0, MAX_ERROR_MESSAGE_LENGTH),
        });
        throw error;
      }
      await this.report(jobId, { status: 'succeeded' });
    };
  }
}

function readErrorCode(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string' || typeof code === 'number') {
      return String(code);
    }
  }
  return DEFAULT_ERROR_CODE;
}

function readErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
