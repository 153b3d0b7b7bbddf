import { Global, Module } from '@nestjs/common';
import { DeadLetterReprocessor } from './application/dead-letters/reprocess-dead-letters.service';
import { OPERATOR_ALERTS_PORT } from './application/dead-letters/ports/operator-alerts.port';
import { JobStatusReporter } from './application/jobs/job-status-reporter.service';
import { JOB_STATUS_PORT } from './application/jobs/ports/job-status.port';
import { BROKER_CHANNELS_PORT } from './application/messaging/ports/broker-channels.port';
import { QUEUE_PUBLISHER_PORT } from './application/messaging/ports/queue-publisher.port';
import { IDEMPOTENCY_PORT } from './application/queues/ports/idempotency.port';
import { QUEUE_CONSUMER_SETTINGS } from './application/queues/queue-consumer-settings';
import { QueueHandlerRegistry } from './application/queues/queue-handler-registry';
import { DiscordOperatorAlertsAdapter } from './infrastructure/alerts/discord-operator-alerts.adapter';
import { HttpBackendApiAdapter } from './infrastructure/api/http-backend-api.adapter';
import { BotServiceConfigService } from './infrastructure/config/bot-service-config.service';
import { AmqpBrokerChannelsAdapter } from './infrastructure/messaging/amqp-broker-channels.adapter';
import { RabbitMqQueuePublisherAdapter } from './infrastructure/messaging/rabbitmq-queue-publisher.adapter';
import { QueueConsumerEngine } from './presentation/messaging/queue-consumer-engine.service';
import { QueueRuntimeBootstrapService } from './presentation/messaging/queue-runtime-bootstrap.service';
import { DeadLetterSweeperService } from './presentation/workers/dead-letter-sweeper.service';

/**
 * Queue consumption runtime. Global so that feature modules can inject
 * `QueueHandlerRegistry`, `JobStatusReporter` and the publisher port and
 * register their handlers from `onModuleInit`.
 */
@Global()
@Module({
  providers: [
    BotServiceConfigService,
    {
      provide: QUEUE_CONSUMER_SETTINGS,
      inject: [BotServiceConfigService],
      useFactory: (config: BotServiceConfigService) => config.queueConsumerSettings,
    },
    AmqpBrokerChannelsAdapter,
    {
      provide: BROKER_CHANNELS_PORT,
      useExisting: AmqpBrokerChannelsAdapter,
    },
    RabbitMqQueuePublisherAdapter,
    {
      provide: QUEUE_PUBLISHER_PORT,
      useExisting: RabbitMqQueuePublisherAdapter,
    },
    HttpBackendApiAdapter,
    {
      provide: IDEMPOTENCY_PORT,
      useExisting: HttpBackendApiAdapter,
    },
    {
      provide: JOB_STATUS_PORT,
      useExisting: HttpBackendApiAdapter,
    },
    DiscordOperatorAlertsAdapter,
    {
      provide: OPERATOR_ALERTS_PORT,
      useExisting: DiscordOperatorAlertsAdapter,
    },
    QueueHandlerRegistry,
    JobStatusReporter,
    DeadLetterReprocessor,
    QueueConsumerEngine,
    DeadLetterSweeperService,
    QueueRuntimeBootstrapService,
  ],
  exports: [
    BotServiceConfigService,
    QUEUE_CONSUMER_SETTINGS,
    QUEUE_PUBLISHER_PORT,
    JOB_STATUS_PORT,
    QueueHandlerRegistry,
    JobStatusReporter,
    QueueConsumerEngine,
  ],
})
export class QueueConsumptionModule {}
