import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  PERSISTENT_DELIVERY_MODE,
  createJsonLogLine,
  ensureMessageId,
} from '@queue-relay/shared';
import { waitForDrain } from '../../application/messaging/broker-drain';
import {
  BROKER_CHANNELS_PORT,
  type BrokerChannelsPort,
} from '../../application/messaging/ports/broker-channels.port';
import type {
  PublishToQueueOptions,
  QueuePublisherPort,
} from '../../application/messaging/ports/queue-publisher.port';

const SERVICE_NAME = 'bot-service';

@Injectable()
export class RabbitMqQueuePublisherAdapter implements QueuePublisherPort {
  private readonly logger = new Logger(RabbitMqQueuePublisherAdapter.name);

  constructor(
    @Inject(BROKER_CHANNELS_PORT)
    private readonly channels: BrokerChannelsPort,
  ) {}

  async publish(queueName: string, payload: unknown, options: PublishToQueueOptions = {}): Promise<string> {
    const messageId = ensureMessageId(options.messageId);
    const content = Buffer.isBuffer(payload) ? payload : Buffer.from(JSON.stringify(payload), 'utf-8');

    await this.channels.withChannel(async (channel) => {
      const published = channel.sendToQueue(queueName, content, {
        contentType: 'application/json',
        contentEncoding: 'utf-8',
        deliveryMode: PERSISTENT_DELIVERY_MODE,
        timestamp: Date.now(),
        messageId,
        correlationId: options.correlationId,
        type: options.type,
        headers: options.headers ?? {},
      });

      if (!published) {
        await waitForDrain(channel);
      }

      await channel.waitForConfirms();
    });

    this.logger.debug(createJsonLogLine({
      level: 'debug',
      service: SERVICE_NAME,
      message: `Published message to "${queueName}".`,
      correlationId: options.correlationId ?? 'system',
      messageId,
      messageType: options.type,
      queue: queueName,
    }));

    return messageId;
  }
}
