import { createJsonLogLine, type LogLevel } from '../logging/json-log.js';

export interface AmqpMessageLike {
  content: Buffer;
  fields: {
    routingKey?: unknown;
  };
  properties: {
    messageId?: unknown;
    correlationId?: unknown;
    type?: unknown;
    headers?: unknown;
  };
}

export interface AmqpMessageIds {
  messageId?: string;
  correlationId?: string;
  messageType?: string;
  routingKey?: string;
}

export function readAmqpMessageIds(message: AmqpMessageLike): AmqpMessageIds {
  return {
    messageId: optionalString(message.properties.messageId),
    correlationId: optionalString(message.properties.correlationId),
    messageType: optionalString(message.properties.type),
    routingKey: optionalString(message.fields.routingKey),
  };
}

export function copyHeaders(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    return {};
  }
  return { ...value };
}

export function isHeaderFlagSet(value: unknown): boolean {
  if (value === true || value === 1) {
    return true;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    return normalized === 'true' || normalized === '1';
  }

  return false;
}

export function createAmqpMessageLogLine(input: {
  level: LogLevel;
  service: string;
  message: string;
  queue: string;
  amqpMessage?: AmqpMessageLike;
  jobId?: string;
  error?: unknown;
  metadata?: Record<string, unknown>;
}): string {
  const ids = input.amqpMessage ? readAmqpMessageIds(input.amqpMessage) : {};

  return createJsonLogLine({
    level: input.level,
    service: input.service,
    message: input.message,
    correlationId: ids.correlationId ?? 'unknown',
    messageId: ids.messageId,
    messageType: ids.messageType,
    routingKey: ids.routingKey,
    queue: input.queue,
    jobId: input.jobId,
    metadata: input.metadata,
    error: input.error,
  });
}

/**
 * Renders a message body for humans, cut to `maxChars` with a trailing marker.
 * The cut never splits a surrogate pair.
 */
export function renderBodyForAlert(content: Buffer, maxChars: number): string {
  const text = content.toString('utf-8');
  if (text.length <= maxChars) {
    return text;
  }

  const end = maxChars > 0 && isHighSurrogate(text.charCodeAt(maxChars - 1)) ? maxChars - 1 : maxChars;
  return `${text.slice(0, end)}... (truncated)`;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function formatDeadLetterAlert(deadLetterQueue: string, content: Buffer, maxChars: number): string {
  return `### ${deadLetterQueue}\n\`\`\`json\n${renderBodyForAlert(content, maxChars)}\n\`\`\``;
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
