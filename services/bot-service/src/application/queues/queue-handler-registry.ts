import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  copyHeaders,
  createAmqpMessageLogLine,
  isHeaderFlagSet,
  normalizeQueueName,
  optionalString,
  settle,
} from '@queue-relay/shared';
import type { BrokerDelivery } from '../messaging/ports/broker-channels.port';
import type { MessageDecoder } from './message-decoder';
import { IDEMPOTENCY_PORT, type IdempotencyPort } from './ports/idempotency.port';
import { QUEUE_CONSUMER_SETTINGS, type QueueConsumerSettings } from './queue-consumer-settings';

const SERVICE_NAME = 'bot-service';

export type QueueHandlerCallback<TPayload> = (
  payload: TPayload,
  message: BrokerDelivery,
) => Promise<void>;

export interface QueueHandlerRegistration<TPayload> {
  queueName: string;
  decoder: MessageDecoder<TPayload>;
  idempotent?: boolean;
  /** The service that owns `callback`; used to attribute log lines. */
  owner: object;
  callback: QueueHandlerCallback<TPayload>;
}

export interface RegisteredQueueHandler {
  readonly queueName: string;
  readonly ownerName: string;
  readonly typeName: string;
  readonly idempotent: boolean;
  /** Decodes the body and returns the bound business call; throws on a decode failure. */
  prepare(message: BrokerDelivery): () => Promise<void>;
}

export type QueueHandlerOutcome = 'handled' | 'bypassed' | 'duplicate';

export type WrappedQueueHandler = (message: BrokerDelivery) => Promise<QueueHandlerOutcome>;

@Injectable()
export class QueueHandlerRegistry {
  private readonly logger = new Logger(QueueHandlerRegistry.name);
  private readonly handlers: RegisteredQueueHandler[] = [];

  constructor(
    @Inject(IDEMPOTENCY_PORT)
    private readonly idempotency: IdempotencyPort,
    @Inject(QUEUE_CONSUMER_SETTINGS)
    private readonly settings: QueueConsumerSettings,
  ) {}

  /**
   * Adds a handler for a queue. A second registration for the same queue is a
   * configuration error: it is logged, ignored, and `false` is returned.
   */
  register<TPayload>(registration: QueueHandlerRegistration<TPayload>): boolean {
    const queueName = normalizeQueueName(registration.queueName);
    const ownerName = registration.owner.constructor.name;
    const existing = this.handlers.find((handler) => handler.queueName === queueName);

    if (existing) {
      this.logger.error(createAmqpMessageLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'Duplicate queue handler registration ignored; the earlier registration wins.',
        queue: queueName,
        metadata: {
          registeredOwner: existing.ownerName,
          rejectedOwner: ownerName,
        },
      }));
      return false;
    }

    const { decoder, callback } = registration;
    this.handlers.push({
      queueName,
      ownerName,
      typeName: decoder.typeName,
      idempotent: registration.idempotent ?? false,
      prepare(message: BrokerDelivery): () => Promise<void> {
        const payload = decoder.decode(message.content);
        return () => callback(payload, message);
      },
    });

    this.logger.debug(createAmqpMessageLogLine({
      level: 'debug',
      service: SERVICE_NAME,
      message: 'Queue handler registered.',
      queue: queueName,
      metadata: {
        owner: ownerName,
        decodeType: decoder.typeName,
        idempotent: registration.idempotent ?? false,
      },
    }));
    return true;
  }

  list(): readonly RegisteredQueueHandler[] {
    return this.handlers;
  }

  resolveAll(): Map<string, WrappedQueueHandler> {
    return new Map(this.handlers.map((handler) => [handler.queueName, this.wrap(handler)]));
  }

  private wrap(handler: RegisteredQueueHandler): WrappedQueueHandler {
    return async (message: BrokerDelivery): Promise<QueueHandlerOutcome> => {
      const headers = copyHeaders(message.properties.headers);
      if (isHeaderFlagSet(headers[this.settings.testBypassHeader])) {
        this.logger.debug(createAmqpMessageLogLine({
          level: 'debug',
          service: SERVICE_NAME,
          message: 'Test-bypass message acknowledged without processing.',
          queue: handler.queueName,
          amqpMessage: message,
        }));
        return 'bypassed';
      }

      const invoke = handler.prepare(message);
      const messageId = optionalString(message.properties.messageId);

      if (!handler.idempotent || !messageId) {
        await invoke();
        return 'handled';
      }

      const claim = await this.idempotency.claim(messageId);
      if (!claim.claimed) {
        this.logger.debug(createAmqpMessageLogLine({
          level: 'debug',
          service: SERVICE_NAME,
          message: 'Duplicate message ignored.',
          queue: handler.queueName,
          amqpMessage: message,
        }));
        return 'duplicate';
      }

      try {
        await invoke();
      } catch (error) {
        const released = await settle(() => this.idempotency.deleteClaim(messageId));
        if (!released.ok) {
          this.logger.warn(createAmqpMessageLogLine({
            level: 'warn',
            service: SERVICE_NAME,
            message: 'Failed to delete idempotency claim after handler error.',
            queue: handler.queueName,
            amqpMessage: message,
            error: released.error,
          }));
        }
        throw error;
      }

      return 'handled';
    };
  }
}
