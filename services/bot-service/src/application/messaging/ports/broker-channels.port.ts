import type { EventEmitter } from 'node:events';

export const BROKER_CHANNELS_PORT = Symbol('BROKER_CHANNELS_PORT');

export interface BrokerMessageProperties {
  headers?: Record<string, unknown>;
  contentType?: unknown;
  contentEncoding?: unknown;
  deliveryMode?: unknown;
  correlationId?: unknown;
  messageId?: unknown;
  timestamp?: unknown;
  type?: unknown;
  appId?: unknown;
  userId?: unknown;
}

export interface BrokerDelivery {
  content: Buffer;
  fields: {
    deliveryTag: number;
    redelivered: boolean;
    routingKey: string;
  };
  properties: BrokerMessageProperties;
}

export interface BrokerPublishOptions {
  headers?: Record<string, unknown>;
  contentType?: string;
  contentEncoding?: string;
  deliveryMode?: number;
  correlationId?: string;
  messageId?: string;
  timestamp?: number;
  type?: string;
  appId?: string;
  userId?: string;
}

export interface BrokerQueueInfo {
  queue: string;
  messageCount: number;
  consumerCount: number;
}

export interface BrokerAssertQueueOptions {
  durable?: boolean;
  arguments?: Record<string, unknown>;
}

/**
 * The slice of an AMQP channel the consumption core relies on. An amqplib
 * `Channel` satisfies it structurally. Emits `close`, `error` and `drain`.
 */
export interface BrokerChannel extends EventEmitter {
  assertQueue(queue: string, options?: BrokerAssertQueueOptions): Promise<BrokerQueueInfo>;
  checkQueue(queue: string): Promise<BrokerQueueInfo>;
  prefetch(count: number): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (message: BrokerDelivery | null) => void,
  ): Promise<{ consumerTag: string }>;
  cancel(consumerTag: string): Promise<unknown>;
  get(queue: string, options?: { noAck?: boolean }): Promise<BrokerDelivery | false>;
  ack(message: BrokerDelivery): void;
  nack(message: BrokerDelivery, allUpTo?: boolean, requeue?: boolean): void;
  sendToQueue(queue: string, content: Buffer, options?: BrokerPublishOptions): boolean;
  close(): Promise<void>;
}

/** A channel in publisher-confirm mode, such as an amqplib `ConfirmChannel`. */
export interface BrokerConfirmChannel extends BrokerChannel {
  /** Resolves once every publish so far is confirmed; rejects if any was nacked. */
  waitForConfirms(): Promise<void>;
}

export interface BrokerConnection extends EventEmitter {
  createChannel(): Promise<BrokerChannel>;
  createConfirmChannel(): Promise<BrokerConfirmChannel>;
  close(): Promise<void>;
}

/**
 * Scoped access to pooled broker resources. Resources are borrowed for the
 * duration of `work` and returned afterwards; callers never close them.
 * Pooled channels run in confirm mode.
 */
export interface BrokerChannelsPort {
  withConnection<T>(work: (connection: BrokerConnection) => Promise<T>): Promise<T>;
  withChannel<T>(work: (channel: BrokerConfirmChannel) => Promise<T>): Promise<T>;
}
