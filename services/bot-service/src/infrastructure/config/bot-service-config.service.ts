import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RESERVED_HEADERS } from '@queue-relay/shared';
import type { QueueConsumerSettings } from '../../application/queues/queue-consumer-settings';

const DEFAULTS = {
  port: 3010,
  rabbitmqUser: 'guest',
  rabbitmqPassword: 'guest',
  rabbitmqHost: 'localhost',
  connectionPoolSize: 2,
  channelPoolSize: 10,
  resubscribeDelayMs: 5000,
  testBypassHeader: RESERVED_HEADERS.testBypass,
  deadLetterNotifiedHeader: RESERVED_HEADERS.deadLetterNotified,
  deadLetterSweepIntervalSeconds: 60,
  deadLetterMaxPerQueueTick: 5000,
  deadLetterGetTimeoutMs: 100,
  deadLetterAlertBodyMaxChars: 1500,
  startupDrainTimeoutMs: 0,
  backendApiUrl: 'http://localhost:8000',
  backendApiTimeoutMs: 5000,
  chatApiUrl: 'https://discord.com/api/v10',
  chatApiTimeoutMs: 5000,
} as const;

export const BOT_SERVICE_ENV_FILE_PATHS = [
  '.env.local',
  '.env',
  '../../.env.local',
  '../../.env',
];

@Injectable()
export class BotServiceConfigService {
  constructor(private readonly config: ConfigService) {}

  get port(): number {
    return this.config.get<number>('BOT_SERVICE_PORT', DEFAULTS.port);
  }

  get rabbitmqUrl(): string {
    return this.config.getOrThrow<string>('RABBITMQ_URL');
  }

  get connectionPoolSize(): number {
    return this.config.get<number>('RABBITMQ_CONNECTION_POOL_SIZE', DEFAULTS.connectionPoolSize);
  }

  get channelPoolSize(): number {
    return this.config.get<number>('RABBITMQ_CHANNEL_POOL_SIZE', DEFAULTS.channelPoolSize);
  }

  get resubscribeDelayMs(): number {
    return this.config.get<number>('RABBITMQ_RESUBSCRIBE_DELAY_MS', DEFAULTS.resubscribeDelayMs);
  }

  get testBypassHeader(): string {
    return this.config.get<string>('QUEUE_TEST_BYPASS_HEADER', DEFAULTS.testBypassHeader);
  }

  get deadLetterNotifiedHeader(): string {
    return this.config.get<string>('DLQ_HEADER_KEY', DEFAULTS.deadLetterNotifiedHeader);
  }

  get deadLetterSweepIntervalSeconds(): number {
    return this.config.get<number>('DLQ_PROCESS_INTERVAL', DEFAULTS.deadLetterSweepIntervalSeconds);
  }

  get deadLetterMaxPerQueueTick(): number {
    return this.config.get<number>('DLQ_MAX_PER_QUEUE_TICK', DEFAULTS.deadLetterMaxPerQueueTick);
  }

  get deadLetterGetTimeoutMs(): number {
    return this.config.get<number>('DLQ_GET_TIMEOUT_MS', DEFAULTS.deadLetterGetTimeoutMs);
  }

  get deadLetterAlertBodyMaxChars(): number {
    return this.config.get<number>('DLQ_ALERT_BODY_MAX_CHARS', DEFAULTS.deadLetterAlertBodyMaxChars);
  }

  get startupDrainTimeoutMs(): number {
    return this.config.get<number>('STARTUP_DRAIN_TIMEOUT_MS', DEFAULTS.startupDrainTimeoutMs);
  }

  get backendApiUrl(): string {
    return this.config.get<string>('BACKEND_API_URL', DEFAULTS.backendApiUrl);
  }

  get backendApiKey(): string {
    return this.config.getOrThrow<string>('BACKEND_API_KEY');
  }

  get backendApiTimeoutMs(): number {
    return this.config.get<number>('BACKEND_API_TIMEOUT_MS', DEFAULTS.backendApiTimeoutMs);
  }

  get chatApiUrl(): string {
    return this.config.get<string>('CHAT_API_URL', DEFAULTS.chatApiUrl);
  }

  get chatApiTimeoutMs(): number {
    return this.config.get<number>('CHAT_API_TIMEOUT_MS', DEFAULTS.chatApiTimeoutMs);
  }

  get chatBotToken(): string {
    return this.config.getOrThrow<string>('CHAT_BOT_TOKEN');
  }

  get deadLetterAlertChannelId(): string {
    return this.config.getOrThrow<string>('DLQ_ALERT_CHANNEL_ID');
  }

  get queueConsumerSettings(): QueueConsumerSettings {
    return {
      testBypassHeader: this.testBypassHeader,
      deadLetterNotifiedHeader: this.deadLetterNotifiedHeader,
      sweepIntervalMs: this.deadLetterSweepIntervalSeconds * 1000,
      maxPerQueuePerSweep: this.deadLetterMaxPerQueueTick,
      deadLetterGetTimeoutMs: this.deadLetterGetTimeoutMs,
      alertBodyMaxChars: this.deadLetterAlertBodyMaxChars,
      startupDrainTimeoutMs: this.startupDrainTimeoutMs,
      resubscribeDelayMs: this.resubscribeDelayMs,
    };
  }
}

export function validateBotServiceEnvironment(
  raw: Record<string, unknown>,
): Record<string, unknown> {
  const env = { ...raw };

  env.BOT_SERVICE_PORT = toPositiveInt(raw.BOT_SERVICE_PORT, DEFAULTS.port, 'BOT_SERVICE_PORT');
  env.RABBITMQ_URL = optionalString(raw.RABBITMQ_URL) ?? buildRabbitMqUrl(raw);
  env.RABBITMQ_CONNECTION_POOL_SIZE = toPositiveInt(
    raw.RABBITMQ_CONNECTION_POOL_SIZE,
    DEFAULTS.connectionPoolSize,
    'RABBITMQ_CONNECTION_POOL_SIZE',
  );
  env.RABBITMQ_CHANNEL_POOL_SIZE = toPositiveInt(
    raw.RABBITMQ_CHANNEL_POOL_SIZE,
    DEFAULTS.channelPoolSize,
    'RABBITMQ_CHANNEL_POOL_SIZE',
  );
  env.RABBITMQ_RESUBSCRIBE_DELAY_MS = toPositiveInt(
    raw.RABBITMQ_RESUBSCRIBE_DELAY_MS,
    DEFAULTS.resubscribeDelayMs,
    'RABBITMQ_RESUBSCRIBE_DELAY_MS',
  );
  env.QUEUE_TEST_BYPASS_HEADER =
    optionalString(raw.QUEUE_TEST_BYPASS_HEADER) ?? DEFAULTS.testBypassHeader;
  env.DLQ_HEADER_KEY = optionalString(raw.DLQ_HEADER_KEY) ?? DEFAULTS.deadLetterNotifiedHeader;
  env.DLQ_PROCESS_INTERVAL = toPositiveInt(
    raw.DLQ_PROCESS_INTERVAL,
    DEFAULTS.deadLetterSweepIntervalSeconds,
    'DLQ_PROCESS_INTERVAL',
  );
  env.DLQ_MAX_PER_QUEUE_TICK = toPositiveInt(
    raw.DLQ_MAX_PER_QUEUE_TICK,
    DEFAULTS.deadLetterMaxPerQueueTick,
    'DLQ_MAX_PER_QUEUE_TICK',
  );
  env.DLQ_GET_TIMEOUT_MS = toPositiveInt(
    raw.DLQ_GET_TIMEOUT_MS,
    DEFAULTS.deadLetterGetTimeoutMs,
    'DLQ_GET_TIMEOUT_MS',
  );
  env.DLQ_ALERT_BODY_MAX_CHARS = toPositiveInt(
    raw.DLQ_ALERT_BODY_MAX_CHARS,
    DEFAULTS.deadLetterAlertBodyMaxChars,
    'DLQ_ALERT_BODY_MAX_CHARS',
  );
  env.STARTUP_DRAIN_TIMEOUT_MS = toNonNegativeInt(
    raw.STARTUP_DRAIN_TIMEOUT_MS,
    DEFAULTS.startupDrainTimeoutMs,
    'STARTUP_DRAIN_TIMEOUT_MS',
  );
  env.BACKEND_API_URL = stripTrailingSlash(optionalString(raw.BACKEND_API_URL) ?? DEFAULTS.backendApiUrl);
  env.BACKEND_API_KEY = requiredString(raw.BACKEND_API_KEY, 'BACKEND_API_KEY');
  env.BACKEND_API_TIMEOUT_MS = toPositiveInt(
    raw.BACKEND_API_TIMEOUT_MS,
    DEFAULTS.backendApiTimeoutMs,
    'BACKEND_API_TIMEOUT_MS',
  );
  env.CHAT_API_URL = stripTrailingSlash(optionalString(raw.CHAT_API_URL) ?? DEFAULTS.chatApiUrl);
  env.CHAT_API_TIMEOUT_MS = toPositiveInt(
    raw.CHAT_API_TIMEOUT_MS,
    DEFAULTS.chatApiTimeoutMs,
    'CHAT_API_TIMEOUT_MS',
  );
  env.CHAT_BOT_TOKEN = requiredString(raw.CHAT_BOT_TOKEN, 'CHAT_BOT_TOKEN');
  env.DLQ_ALERT_CHANNEL_ID = requiredString(raw.DLQ_ALERT_CHANNEL_ID, 'DLQ_ALERT_CHANNEL_ID');

  return env;
}

function buildRabbitMqUrl(raw: Record<string, unknown>): string {
  const user = encodeURIComponent(optionalString(raw.RABBITMQ_DEFAULT_USER) ?? DEFAULTS.rabbitmqUser);
  const password = encodeURIComponent(optionalString(raw.RABBITMQ_DEFAULT_PASS) ?? DEFAULTS.rabbitmqPassword);
  const host = optionalString(raw.RABBITMQ_HOST) ?? DEFAULTS.rabbitmqHost;
  return `amqp://${user}:${password}@${host}/`;
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

function requiredString(value: unknown, name: string): string {
  const normalized = optionalString(value);
  if (!normalized) {
    throw new Error(`[bot-service] ${name} is required.`);
  }
  return normalized;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

function toPositiveInt(value: unknown, fallback: number, name: string): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`[bot-service] ${name} must be a positive integer.`);
  }

  return Math.trunc(parsed);
}

function toNonNegativeInt(value: unknown, fallback: number, name: string): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`[bot-service] ${name} must be zero or a positive integer.`);
  }

  return Math.trunc(parsed);
}
