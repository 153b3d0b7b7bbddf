import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { createJsonLogLine } from '@queue-relay/shared';
import { DeadLetterReprocessor } from '../../application/dead-letters/reprocess-dead-letters.service';
import {
  QUEUE_CONSUMER_SETTINGS,
  type QueueConsumerSettings,
} from '../../application/queues/queue-consumer-settings';
import { QueueConsumerEngine } from '../messaging/queue-consumer-engine.service';

const SERVICE_NAME = 'bot-service';

@Injectable()
export class DeadLetterSweeperService implements OnModuleDestroy {
  private readonly logger = new Logger(DeadLetterSweeperService.name);
  private timer?: NodeJS.Timeout;
  private sweeping = false;

  constructor(
    private readonly reprocessor: DeadLetterReprocessor,
    private readonly engine: QueueConsumerEngine,
    @Inject(QUEUE_CONSUMER_SETTINGS)
    private readonly settings: QueueConsumerSettings,
  ) {}

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    const intervalMs = this.settings.sweepIntervalMs;
    this.timer = setInterval(() => {
      void this.safeSweep();
    }, intervalMs);
    this.timer.unref();

    void this.safeSweep();
    this.logger.log(createJsonLogLine({
      level: 'info',
      service: SERVICE_NAME,
      message: 'Dead-letter sweeper started.',
      correlationId: 'system',
      metadata: {
        intervalMs,
        maxPerQueuePerSweep: this.settings.maxPerQueuePerSweep,
        targets: this.engine.listTargetDeadLetterQueues(),
      },
    }));
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Runs one sweep unless the previous one is still in flight. Never rejects.
   */
  async safeSweep(): Promise<void> {
    if (this.sweeping) {
      return;
    }

    const queues = this.engine.registeredQueues();
    if (queues.length === 0) {
      return;
    }

    this.sweeping = true;
    try {
      const result = await this.reprocessor.sweepOnce(queues);
      if (result.processed > 0) {
        this.logger.log(createJsonLogLine({
          level: 'info',
          service: SERVICE_NAME,
          message: `Dead-letter sweep touched ${result.processed} message(s).`,
          correlationId: 'system',
          metadata: { queues: result.queues },
        }));
      }
    } catch (error) {
      this.logger.error(createJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'Dead-letter sweep loop error.',
        correlationId: 'system',
        error,
      }));
    } finally {
      this.sweeping = false;
    }
  }
}
