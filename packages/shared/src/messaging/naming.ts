import { DEAD_LETTER_QUEUE_SUFFIX } from '../standards.js';

export function normalizeQueueName(value: string): string {
  const normalized = value.trim();
  if (!normalized) {
    throw new Error(`Invalid queue name: "${value}"`);
  }

  if (normalized.endsWith(DEAD_LETTER_QUEUE_SUFFIX)) {
    throw new Error(`Queue name "${normalized}" is reserved for dead letters.`);
  }

  return normalized;
}

export function deadLetterQueueName(queueName: string): string {
  return `${queueName}${DEAD_LETTER_QUEUE_SUFFIX}`;
}

export function isDeadLetterQueueName(queueName: string): boolean {
  return queueName.endsWith(DEAD_LETTER_QUEUE_SUFFIX);
}

export function notifiedAtHeaderKey(notifiedHeaderKey: string): string {
  return `${notifiedHeaderKey}_at`;
}

/**
 * Arguments for a durable work queue whose rejected messages land in `<queue>.dlq`
 * through the default exchange.
 */
export function buildDeadLetterQueueArguments(queueName: string): Record<string, string> {
  return {
    'x-dead-letter-exchange': '',
    'x-dead-letter-routing-key': deadLetterQueueName(queueName),
  };
}
