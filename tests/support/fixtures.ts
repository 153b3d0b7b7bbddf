import type { BrokerDelivery } from '../../services/bot-service/src/application/messaging/ports/broker-channels.port';
import type { QueueConsumerSettings } from '../../services/bot-service/src/application/queues/queue-consumer-settings';
import type { IdempotencyPort } from '../../services/bot-service/src/application/queues/ports/idempotency.port';
import type { OperatorAlert, OperatorAlertsPort } from '../../services/bot-service/src/application/dead-letters/ports/operator-alerts.port';
import type {
  JobStatus,
  JobStatusPort,
  JobStatusUpdate,
} from '../../services/bot-service/src/application/jobs/ports/job-status.port';

export function createSettings(overrides: Partial<QueueConsumerSettings> = {}): QueueConsumerSettings {
  return {
    testBypassHeader: 'x-test-enabled',
    deadLetterNotifiedHeader: 'dlq_notified',
    sweepIntervalMs: 60_000,
    maxPerQueuePerSweep: 5_000,
    deadLetterGetTimeoutMs: 100,
    alertBodyMaxChars: 1_500,
    startupDrainTimeoutMs: 0,
    resubscribeDelayMs: 10,
    ...overrides,
  };
}

export function createDelivery(input: {
  body: unknown;
  queue?: string;
  messageId?: string;
  correlationId?: string;
  headers?: Record<string, unknown>;
}): BrokerDelivery {
  return {
    content: Buffer.isBuffer(input.body) ? input.body : Buffer.from(JSON.stringify(input.body), 'utf-8'),
    fields: { deliveryTag: 1, redelivered: false, routingKey: input.queue ?? 'jobs.create' },
    properties: {
      messageId: input.messageId,
      correlationId: input.correlationId,
      headers: input.headers ?? {},
    },
  };
}

/** Claims held in memory, with call logs and optional failures. */
export class FakeIdempotency implements IdempotencyPort {
  readonly claims = new Set<string>();
  readonly claimCalls: string[] = [];
  readonly deleteCalls: string[] = [];
  failDeletes = false;

  async claim(messageId: string): Promise<{ claimed: boolean }> {
    this.claimCalls.push(messageId);
    if (this.claims.has(messageId)) {
      return { claimed: false };
    }
    this.claims.add(messageId);
    return { claimed: true };
  }

  async deleteClaim(messageId: string): Promise<void> {
    this.deleteCalls.push(messageId);
    if (this.failDeletes) {
      throw new Error('backend unavailable');
    }
    this.claims.delete(messageId);
  }
}

export class FakeOperatorAlerts implements OperatorAlertsPort {
  readonly sent: OperatorAlert[] = [];
  failures = 0;

  async sendAlert(alert: OperatorAlert): Promise<void> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('chat platform unavailable');
    }
    this.sent.push(alert);
  }
}

export class FakeJobStatus implements JobStatusPort {
  readonly updates: Array<{ jobId: string; update: JobStatusUpdate }> = [];
  readonly jobs = new Map<string, JobStatus>();
  failUpdates = false;

  async getJob(jobId: string): Promise<JobStatus> {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new Error(`job ${jobId} not found`);
    }
    return job;
  }

  async updateJob(jobId: string, update: JobStatusUpdate): Promise<void> {
    if (this.failUpdates) {
      throw new Error('backend unavailable');
    }
    this.updates.push({ jobId, update });
    this.jobs.set(jobId, { id: jobId, ...update });
  }
}
