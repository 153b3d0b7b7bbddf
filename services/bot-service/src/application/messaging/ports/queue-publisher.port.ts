export const QUEUE_PUBLISHER_PORT = Symbol('QUEUE_PUBLISHER_PORT');

export interface PublishToQueueOptions {
  messageId?: string;
  correlationId?: string;
  headers?: Record<string, unknown>;
  type?: string;
}

export interface QueuePublisherPort {
  /** Publishes a persistent JSON message to `queueName` and returns its message id once the broker confirms it. */
  publish(queueName: string, payload: unknown, options?: PublishToQueueOptions): Promise<string>;
}
