import type { QueueConsumerSettings } from '../../services/bot-service/src/application/queues/queue-consumer-settings';
import { QueueHandlerRegistry } from '../../services/bot-service/src/application/queues/queue-handler-registry';
import { BrokerChannelPool } from '../../services/bot-service/src/infrastructure/messaging/broker-channel-pool';
import { QueueConsumerEngine } from '../../services/bot-service/src/presentation/messaging/queue-consumer-engine.service';
import { FakeIdempotency, createSettings } from './fixtures';
import { InMemoryBroker } from './in-memory-broker';

/**
 * Wires the consumption core over an in-memory broker the same way the Nest
 * module does over amqplib.
 */
export function createRuntime(overrides: Partial<QueueConsumerSettings> = {}) {
  const broker = new InMemoryBroker();
  const settings = createSettings(overrides);
  const idempotency = new FakeIdempotency();
  const pool = new BrokerChannelPool(() => broker.connect(), { connectionPoolSize: 2, channelPoolSize: 10 });
  const registry = new QueueHandlerRegistry(idempotency, settings);
  const engine = new QueueConsumerEngine(registry, pool, settings);

  return {
    broker,
    settings,
    idempotency,
    pool,
    registry,
    engine,
    async stop(): Promise<void> {
      await engine.onModuleDestroy();
      await pool.close();
    },
  };
}
