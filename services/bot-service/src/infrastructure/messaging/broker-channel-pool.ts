import { Logger } from '@nestjs/common';
import { createJsonLogLine } from '@queue-relay/shared';
import type {
  BrokerChannelsPort,
  BrokerConfirmChannel,
  BrokerConnection,
} from '../../application/messaging/ports/broker-channels.port';
import { ResourcePool } from './resource-pool';

const SERVICE_NAME = 'bot-service';

export interface BrokerChannelPoolOptions {
  connectionPoolSize: number;
  channelPoolSize: number;
}

/**
 * A small pool of broker connections and a larger pool of confirm channels
 * opened on them. Closed connections and channels are replaced on the next acquisition.
 */
export class BrokerChannelPool implements BrokerChannelsPort {
  private readonly logger = new Logger(BrokerChannelPool.name);
  private readonly closedResources = new WeakSet<object>();
  private readonly connections: ResourcePool<BrokerConnection>;
  private readonly channels: ResourcePool<BrokerConfirmChannel>;

  constructor(
    connect: () => Promise<BrokerConnection>,
    options: BrokerChannelPoolOptions,
  ) {
    this.connections = new ResourcePool<BrokerConnection>({
      name: 'broker-connections',
      maxSize: options.connectionPoolSize,
      create: async () => this.track(await this.openConnection(connect), 'connection'),
      isUsable: (connection) => !this.closedResources.has(connection),
      destroy: (connection) => connection.close(),
      onDestroyError: (error) => this.logCloseError('connection', error),
    });

    this.channels = new ResourcePool<BrokerConfirmChannel>({
      name: 'broker-channels',
      maxSize: options.channelPoolSize,
      create: () => this.connections.use(async (connection) => this.track(await connection.createConfirmChannel(), 'channel')),
      isUsable: (channel) => !this.closedResources.has(channel),
      destroy: (channel) => channel.close(),
      onDestroyError: (error) => this.logCloseError('channel', error),
    });
  }

  withConnection<T>(work: (connection: BrokerConnection) => Promise<T>): Promise<T> {
    return this.connections.use(work);
  }

  withChannel<T>(work: (channel: BrokerConfirmChannel) => Promise<T>): Promise<T> {
    return this.channels.use(work);
  }

  async close(): Promise<void> {
    await this.channels.close();
    await this.connections.close();
  }

  private async openConnection(connect: () => Promise<BrokerConnection>): Promise<BrokerConnection> {
    try {
      return await connect();
    } catch (error) {
      this.logger.error(createJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'Error connecting to the broker.',
        correlationId: 'system',
        error,
      }));
      throw error;
    }
  }

  private track<T extends BrokerConnection | BrokerConfirmChannel>(resource: T, kind: 'connection' | 'channel'): T {
    resource.on('error', (error?: unknown) => {
      this.logger.error(createJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: `AMQP ${kind} error.`,
        correlationId: 'system',
        error,
      }));
    });
    resource.on('close', () => {
      this.closedResources.add(resource);
      this.logger.warn(createJsonLogLine({
        level: 'warn',
        service: SERVICE_NAME,
        message: `AMQP pooled ${kind} closed.`,
        correlationId: 'system',
      }));
    });
    return resource;
  }

  private logCloseError(kind: 'connection' | 'channel', error: unknown): void {
    this.logger.debug(createJsonLogLine({
      level: 'debug',
      service: SERVICE_NAME,
      message: `AMQP ${kind} was already closed when discarded.`,
      correlationId: 'system',
      error,
    }));
  }
}
