import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { ServiceInfoQuery } from '../../application/system/service-info.query';
import { QueueConsumerEngine } from '../messaging/queue-consumer-engine.service';

@Controller()
export class AppController {
  constructor(
    private readonly serviceInfoQuery: ServiceInfoQuery,
    private readonly engine: QueueConsumerEngine,
  ) {}

  @Get()
  getRoot() {
    return this.serviceInfoQuery.getInfo();
  }

  @Get('health')
  getHealth() {
    return this.serviceInfoQuery.getInfo();
  }

  @Get('health/ready')
  getReadiness() {
    const readiness = {
      drained: this.engine.isDrained,
      pending: this.engine.pendingStartupMessages,
      queues: this.engine.registeredQueues(),
    };

    if (!readiness.drained) {
      throw new ServiceUnavailableException(readiness);
    }

    return readiness;
  }
}
