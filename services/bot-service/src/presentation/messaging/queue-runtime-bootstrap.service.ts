import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { DeadLetterSweeperService } from '../workers/dead-letter-sweeper.service';
import { QueueConsumerEngine } from './queue-consumer-engine.service';

/**
 * Starts consumption once every module has registered its handlers
 * (handlers register in `onModuleInit`), then starts the sweep loop.
 */
@Injectable()
export class QueueRuntimeBootstrapService implements OnApplicationBootstrap {
  constructor(
    private readonly engine: QueueConsumerEngine,
    private readonly sweeper: DeadLetterSweeperService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.engine.start();
    this.sweeper.start();
  }
}
