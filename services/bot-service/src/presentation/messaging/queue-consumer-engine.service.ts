import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  buildDeadLetterQueueArguments,
  createAmqpMessageLogLine,
  createJsonLogLine,
  deadLetterQueueName,
} from '@queue-relay/shared';
import {
  BROKER_CHANNELS_PORT,
  type BrokerChannel,
  type BrokerChannelsPort,
  type BrokerDelivery,
} from '../../application/messaging/ports/broker-channels.port';
import { MessageDecodeError } from '../../application/queues/message-decoder';
import {
  QueueHandlerRegistry,
  type WrappedQueueHandler,
} from '../../application/queues/queue-handler-registry';
import {
  QUEUE_CONSUMER_SETTINGS,
  type QueueConsumerSettings,
} from '../../application/queues/queue-consumer-settings';
import { StartupDrainGate } from '../../application/queues/startup-drain-gate';

const SERVICE_NAME = 'bot-service';

interface ActiveConsumer {
  channel: BrokerChannel;
  consumerTag: string;
}

@Injectable()
export class QueueConsumerEngine implements OnModuleDestroy {
  private readonly logger = new Logger(QueueConsumerEngine.name);
  private readonly drainGate = new StartupDrainGate();
  private readonly consumers = new Map<string, ActiveConsumer>();
  private readonly resubscribeTimers = new Set<NodeJS.Timeout>();
  private handlers = new Map<string, WrappedQueueHandler>();
  private started = false;
  private stopping = false;

  constructor(
    private readonly registry: QueueHandlerRegistry,
    @Inject(BROKER_CHANNELS_PORT)
    private readonly channels: BrokerChannelsPort,
    @Inject(QUEUE_CONSUMER_SETTINGS)
    private readonly settings: QueueConsumerSettings,
  ) {}

  get isDrained(): boolean {
    return !this.drainGate.isDraining;
  }

  get pendingStartupMessages(): number {
    return this.drainGate.pendingCount;
  }

  registeredQueues(): string[] {
    return Array.from(this.handlers.keys());
  }

  listTargetDeadLetterQueues(): string[] {
    return this.registeredQueues().map((queue) => deadLetterQueueName(queue));
  }

  /**
   * Declares every registered queue with its dead-letter queue, counts the
   * backlog and starts consuming. A failure here is a startup fault.
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    this.handlers = this.registry.resolveAll();

    if (this.handlers.size === 0) {
      this.logger.warn(createJsonLogLine({
        level: 'warn',
        service: SERVICE_NAME,
        message: 'No queue handlers registered at startup.',
        correlationId: 'system',
      }));
    }

    for (const [queue, handler] of this.handlers) {
      await this.subscribe(queue, handler, true);
    }

    if (this.drainGate.seal()) {
      this.logger.log(createJsonLogLine({
        level: 'info',
        service: SERVICE_NAME,
        message: 'No startup messages to process; marked as drained.',
        correlationId: 'system',
      }));
    }
  }

  /**
   * Resolves once the backlog counted at startup has been acknowledged. With a
   * configured fallback timeout, logs and resolves instead of waiting forever.
   * For feature modules that must hold work until the backlog is processed;
   * the readiness probe polls `isDrained` instead.
   */
  async waitUntilDrained(): Promise<void> {
    const result = await this.drainGate.wait(this.settings.startupDrainTimeoutMs);
    if (result === 'timed-out') {
      this.logger.warn(createJsonLogLine({
        level: 'warn',
        service: SERVICE_NAME,
        message: 'Startup drain timed out; continuing anyway.',
        correlationId: 'system',
        metadata: {
          pending: this.drainGate.pendingCount,
          timeoutMs: this.settings.startupDrainTimeoutMs,
        },
      }));
    }
  }

  async onModuleDestroy(): Promise<void> {
    this.stopping = true;

    for (const timer of this.resubscribeTimers) {
      clearTimeout(timer);
    }
    this.resubscribeTimers.clear();

    const consumers = Array.from(this.consumers.entries());
    this.consumers.clear();

    for (const [queue, consumer] of consumers) {
      try {
        await consumer.channel.cancel(consumer.consumerTag);
        await consumer.channel.close();
      } catch (error) {
        this.logger.debug(createJsonLogLine({
          level: 'debug',
          service: SERVICE_NAME,
          message: 'Consumer channel already closed during shutdown.',
          correlationId: 'system',
          queue,
          error,
        }));
      }
    }
  }

  private async subscribe(queue: string, handler: WrappedQueueHandler, countBacklog: boolean): Promise<void> {
    const channel = await this.channels.withConnection((connection) => connection.createChannel());

    channel.on('error', (error?: unknown) => {
      this.logger.error(createJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'AMQP consumer channel error.',
        correlationId: 'system',
        queue,
        error,
      }));
    });
    channel.on('close', () => {
      this.handleChannelClosed(queue, channel);
    });

    await channel.prefetch(1);
    await channel.assertQueue(queue, {
      durable: true,
      arguments: buildDeadLetterQueueArguments(queue),
    });
    await channel.assertQueue(deadLetterQueueName(queue), { durable: true });

    if (countBacklog) {
      const declared = await channel.checkQueue(queue);
      this.drainGate.addPending(declared.messageCount);
      this.logger.log(createJsonLogLine({
        level: 'info',
        service: SERVICE_NAME,
        message: `Queue "${queue}" has ${declared.messageCount} message(s) on startup.`,
        correlationId: 'system',
        queue,
        metadata: { messageCount: declared.messageCount },
      }));
    }

    const consumed = await channel.consume(queue, async (message: BrokerDelivery | null) => {
      if (!message) {
        this.logger.warn(createJsonLogLine({
          level: 'warn',
          service: SERVICE_NAME,
          message: 'Consumer cancelled by the broker.',
          correlationId: 'system',
          queue,
        }));
        return;
      }
      await this.deliver(channel, queue, handler, message);
    });

    this.consumers.set(queue, { channel, consumerTag: consumed.consumerTag });
    this.logger.log(createJsonLogLine({
      level: 'info',
      service: SERVICE_NAME,
      message: `Consuming queue "${queue}" with prefetch=1.`,
      correlationId: 'system',
      queue,
    }));
  }

  private async deliver(
    channel: BrokerChannel,
    queue: string,
    handler: WrappedQueueHandler,
    message: BrokerDelivery,
  ): Promise<void> {
    try {
      const outcome = await handler(message);
      channel.ack(message);

      if (this.drainGate.recordAcknowledged()) {
        this.logger.log(createJsonLogLine({
          level: 'info',
          service: SERVICE_NAME,
          message: 'Startup drain complete.',
          correlationId: 'system',
        }));
      }

      if (outcome !== 'handled') {
        this.logger.debug(createAmqpMessageLogLine({
          level: 'debug',
          service: SERVICE_NAME,
          message: `Message acknowledged without processing (${outcome}).`,
          queue,
          amqpMessage: message,
        }));
      }
    } catch (error) {
      this.reject(channel, queue, message, error);
    }
  }

  private reject(channel: BrokerChannel, queue: string, message: BrokerDelivery, error: unknown): void {
    try {
      channel.nack(message, false, false);
    } catch (nackError) {
      this.logger.error(createAmqpMessageLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'Failed to reject message; the broker will redeliver it.',
        queue,
        amqpMessage: message,
        error: nackError,
      }));
    }

    this.logger.error(createAmqpMessageLogLine({
      level: 'error',
      service: SERVICE_NAME,
      message: error instanceof MessageDecodeError
        ? 'Undecodable message rejected to the dead-letter queue.'
        : 'Error processing message; rejected to the dead-letter queue.',
      queue,
      amqpMessage: message,
      error,
      metadata: { deadLetterQueue: deadLetterQueueName(queue) },
    }));
  }

  private handleChannelClosed(queue: string, channel: BrokerChannel): void {
    const active = this.consumers.get(queue);
    if (this.stopping || active?.channel !== channel) {
      return;
    }

    this.consumers.delete(queue);
    this.logger.warn(createJsonLogLine({
      level: 'warn',
      service: SERVICE_NAME,
      message: 'AMQP consumer channel closed; scheduling resubscribe.',
      correlationId: 'system',
      queue,
      metadata: { delayMs: this.settings.resubscribeDelayMs },
    }));
    this.scheduleResubscribe(queue);
  }

  private scheduleResubscribe(queue: string): void {
    const handler = this.handlers.get(queue);
    if (!handler) {
      return;
    }

    const timer = setTimeout(() => {
      this.resubscribeTimers.delete(timer);
      if (this.stopping) {
        return;
      }

      this.subscribe(queue, handler, false).catch((error: unknown) => {
        this.logger.error(createJsonLogLine({
          level: 'error',
          service: SERVICE_NAME,
          message: 'Resubscribe failed; retrying.',
          correlationId: 'system',
          queue,
          error,
        }));
        this.scheduleResubscribe(queue);
      });
    }, this.settings.resubscribeDelayMs);
    timer.unref();
    this.resubscribeTimers.add(timer);
  }
}
