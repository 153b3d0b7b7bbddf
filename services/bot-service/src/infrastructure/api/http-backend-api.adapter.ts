import { Injectable } from '@nestjs/common';
import type {
  IdempotencyClaimResult,
  IdempotencyPort,
} from '../../application/queues/ports/idempotency.port';
import type {
  JobState,
  JobStatus,
  JobStatusPort,
  JobStatusUpdate,
} from '../../application/jobs/ports/job-status.port';
import { BotServiceConfigService } from '../config/bot-service-config.service';
import { BackendApiError, BackendUnavailableError } from './backend-api.errors';

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

interface JobStatusDto {
  id?: unknown;
  status?: unknown;
  error_code?: unknown;
  error_msg?: unknown;
}

const JOB_STATES: readonly JobState[] = ['queued', 'processing', 'succeeded', 'failed', 'timeout'];

@Injectable()
export class HttpBackendApiAdapter implements IdempotencyPort, JobStatusPort {
  constructor(private readonly config: BotServiceConfigService) {}

  async claim(messageId: string): Promise<IdempotencyClaimResult> {
    const payload = await this.requestJson('POST', '/internal/idempotency/claim', { key: messageId });
    return { claimed: isRecord(payload) && payload.claimed === true };
  }

  async deleteClaim(messageId: string): Promise<void> {
    await this.requestJson('DELETE', '/internal/idempotency/claim', { key: messageId }, [404]);
  }

  async getJob(jobId: string): Promise<JobStatus> {
    const payload = await this.requestJson('GET', `/internal/jobs/${encodeURIComponent(jobId)}`);
    return toJobStatus(jobId, payload);
  }

  async updateJob(jobId: string, update: JobStatusUpdate): Promise<void> {
    await this.requestJson('PATCH', `/internal/jobs/${encodeURIComponent(jobId)}`, {
      status: update.status,
      error_code: update.errorCode ?? null,
      error_msg: update.errorMsg ?? null,
    });
  }

  private async requestJson(
    method: HttpMethod,
    path: string,
    body?: unknown,
    tolerated: readonly number[] = [],
  ): Promise<unknown> {
    const route = `${method} ${path}`;
    let response: Response;

    try {
      response = await fetch(`${this.config.backendApiUrl}${path}`, {
        method,
        headers: {
          accept: 'application/json',
          'x-api-key': this.config.backendApiKey,
          ...(body === undefined ? {} : { 'content-type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.backendApiTimeoutMs),
      });
    } catch (error) {
      throw new BackendUnavailableError(route, error instanceof Error ? error.message : 'unknown error');
    }

    if (tolerated.includes(response.status)) {
      return undefined;
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new BackendApiError(route, response.status, truncate(text, 300));
    }

    if (response.status === 204) {
      return undefined;
    }

    const text = await response.text();
    if (!text) {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new BackendApiError(route, response.status, `invalid JSON body: ${truncate(text, 300)}`);
    }
  }
}

function toJobStatus(jobId: string, payload: unknown): JobStatus {
  const dto: JobStatusDto = isRecord(payload) ? payload : {};
  const status = JOB_STATES.find((state) => state === dto.status);

  if (!status) {
    throw new BackendApiError(`GET /internal/jobs/${jobId}`, 200, `unknown job status ${String(dto.status)}`);
  }

  return {
    id: typeof dto.id === 'string' ? dto.id : jobId,
    status,
    errorCode: typeof dto.error_code === 'string' ? dto.error_code : undefined,
    errorMsg: typeof dto.error_msg === 'string' ? dto.error_msg : undefined,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function truncate(value: string, max: number): string {
  return value.length <= max ? value : `${value.slice(0, max)}...`;
}
