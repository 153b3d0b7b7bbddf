import { Injectable, OnModuleDestroy } from '@nestjs/common';
import * as amqp from 'amqplib';
import { BotServiceConfigService } from '../config/bot-service-config.service';
import { BrokerChannelPool } from './broker-channel-pool';

@Injectable()
export class AmqpBrokerChannelsAdapter extends BrokerChannelPool implements OnModuleDestroy {
  constructor(config: BotServiceConfigService) {
    super(() => amqp.connect(config.rabbitmqUrl), {
      connectionPoolSize: config.connectionPoolSize,
      channelPoolSize: config.channelPoolSize,
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }
}
