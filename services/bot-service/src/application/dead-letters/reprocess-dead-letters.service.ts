import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  copyHeaders,
  createAmqpMessageLogLine,
  createJsonLogLine,
  deadLetterQueueName,
  formatDeadLetterAlert,
  notifiedAtHeaderKey,
  optionalNumber,
  optionalString,
  settle,
} from '@queue-relay/shared';
import { waitForDrain } from '../messaging/broker-drain';
import {
  BROKER_CHANNELS_PORT,
  type BrokerChannelsPort,
  type BrokerConfirmChannel,
  type BrokerDelivery,
  type BrokerPublishOptions,
} from '../messaging/ports/broker-channels.port';
import {
  QUEUE_CONSUMER_SETTINGS,
  type QueueConsumerSettings,
} from '../queues/queue-consumer-settings';
import { OPERATOR_ALERTS_PORT, type OperatorAlertsPort } from './ports/operator-alerts.port';

const SERVICE_NAME = 'bot-service';

export interface DeadLetterQueueSweepResult {
  queue: string;
  snapshot: number;
  cap: number;
  processed: number;
  alerted: number;
  requeued: number;
}

export interface DeadLetterSweepResult {
  processed: number;
  queues: DeadLetterQueueSweepResult[];
}

@Injectable()
export class DeadLetterReprocessor {
  private readonly logger = new Logger(DeadLetterReprocessor.name);

  constructor(
    @Inject(BROKER_CHANNELS_PORT)
    private readonly channels: BrokerChannelsPort,
    @Inject(OPERATOR_ALERTS_PORT)
    private readonly alerts: OperatorAlertsPort,
    @Inject(QUEUE_CONSUMER_SETTINGS)
    private readonly settings: QueueConsumerSettings,
  ) {}

  /**
   * One pass over the dead-letter queue of every base queue, holding a single
   * pooled channel for the whole pass. A failing queue is logged and skipped.
   */
  async sweepOnce(baseQueues: readonly string[]): Promise<DeadLetterSweepResult> {
    return this.channels.withChannel(async (channel) => {
      const queues: DeadLetterQueueSweepResult[] = [];

      for (const baseQueue of baseQueues) {
        try {
          queues.push(await this.sweepQueue(channel, baseQueue));
        } catch (error) {
          this.logger.error(createJsonLogLine({
            level: 'error',
            service: SERVICE_NAME,
            message: 'Error processing dead-letter queue.',
            correlationId: 'system',
            queue: deadLetterQueueName(baseQueue),
            error,
          }));
        }
      }

      return {
        processed: queues.reduce((total, queue) => total + queue.processed, 0),
        queues,
      };
    });
  }

  /**
   * Touches at most as many messages as the queue held when the pass started
   * (and never more than the configured ceiling), so copies republished into
   * the same queue cannot keep the loop alive.
   */
  async sweepQueue(channel: BrokerConfirmChannel, baseQueue: string): Promise<DeadLetterQueueSweepResult> {
    const queue = deadLetterQueueName(baseQueue);
    const snapshot = (await channel.checkQueue(queue)).messageCount;
    const cap = Math.min(snapshot, this.settings.maxPerQueuePerSweep);
    const result: DeadLetterQueueSweepResult = { queue, snapshot, cap, processed: 0, alerted: 0, requeued: 0 };

    while (result.processed < cap) {
      const message = await this.getWithTimeout(channel, queue);
      if (!message) {
        break;
      }

      const headers = copyHeaders(message.properties.headers);
      result.processed += 1;

      if (headers[this.settings.deadLetterNotifiedHeader] === true) {
        await this.republish(channel, queue, message, headers);
        result.requeued += 1;
        continue;
      }

      const alerted = await settle(() => this.alerts.sendAlert({
        queue,
        text: formatDeadLetterAlert(queue, message.content, this.settings.alertBodyMaxChars),
      }));

      if (!alerted.ok) {
        channel.nack(message, false, true);
        this.logger.warn(createAmqpMessageLogLine({
          level: 'warn',
          service: SERVICE_NAME,
          message: 'Dead-letter alert failed; stopping this queue until the next sweep.',
          queue,
          amqpMessage: message,
          error: alerted.error,
        }));
        break;
      }

      await this.republish(channel, queue, message, {
        ...headers,
        [this.settings.deadLetterNotifiedHeader]: true,
        [notifiedAtHeaderKey(this.settings.deadLetterNotifiedHeader)]: Math.floor(Date.now() / 1000),
      });
      result.alerted += 1;
    }

    if (result.processed > 0) {
      this.logger.debug(createJsonLogLine({
        level: 'debug',
        service: SERVICE_NAME,
        message: `Dead-letter queue processed ${result.processed}/${cap} (snapshot=${snapshot}).`,
        correlationId: 'system',
        queue,
        metadata: { ...result },
      }));
    }

    return result;
  }

  /**
   * Copies the message to the tail of its dead-letter queue and acks the
   * original once the broker confirms the copy. When the copy is not
   * confirmed the original goes back to the head of the queue.
   */
  private async republish(
    channel: BrokerConfirmChannel,
    queue: string,
    message: BrokerDelivery,
    headers: Record<string, unknown>,
  ): Promise<void> {
    try {
      const published = channel.sendToQueue(queue, message.content, buildRepublishOptions(message, headers));
      if (!published) {
        await waitForDrain(channel);
      }
      await channel.waitForConfirms();
    } catch (error) {
      this.returnToQueue(channel, queue, message);
      throw error;
    }
    channel.ack(message);
  }

  private returnToQueue(channel: BrokerConfirmChannel, queue: string, message: BrokerDelivery): void {
    try {
      channel.nack(message, false, true);
    } catch (error) {
      // A closed channel has already handed its unacked deliveries back.
      this.logger.debug(createAmqpMessageLogLine({
        level: 'debug',
        service: SERVICE_NAME,
        message: 'Dead letter left to the broker after its channel closed.',
        queue,
        amqpMessage: message,
        error,
      }));
    }
  }

  private async getWithTimeout(channel: BrokerConfirmChannel, queue: string): Promise<BrokerDelivery | false> {
    const pending = channel.get(queue, { noAck: false });
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timed-out'>((resolve) => {
      timer = setTimeout(() => resolve('timed-out'), this.settings.deadLetterGetTimeoutMs);
    });

    try {
      const result = await Promise.race([pending, timedOut]);
      if (result !== 'timed-out') {
        return result;
      }
    } finally {
      clearTimeout(timer);
    }

    void pending
      .then((late) => {
        if (late) {
          channel.nack(late, false, true);
        }
      })
      .catch((error: unknown) => {
        this.logger.warn(createJsonLogLine({
          level: 'warn',
          service: SERVICE_NAME,
          message: 'Late dead-letter get failed after timeout.',
          correlationId: 'system',
          queue,
          error,
        }));
      });
    return false;
  }
}

function buildRepublishOptions(
  message: BrokerDelivery,
  headers: Record<string, unknown>,
): BrokerPublishOptions {
  const properties = message.properties;
  return {
    headers,
    contentType: optionalString(properties.contentType),
    contentEncoding: optionalString(properties.contentEncoding),
    deliveryMode: optionalNumber(properties.deliveryMode),
    correlationId: optionalString(properties.correlationId),
    messageId: optionalString(properties.messageId),
    timestamp: optionalNumber(properties.timestamp),
    type: optionalString(properties.type),
    appId: optionalString(properties.appId),
    userId: optionalString(properties.userId),
  };
}
