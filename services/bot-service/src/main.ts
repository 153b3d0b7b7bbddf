import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { createJsonLogLine } from '@queue-relay/shared';
import { AppModule } from './app.module';
import { BotServiceConfigService } from './infrastructure/config/bot-service-config.service';

const SERVICE_NAME = 'bot-service';
async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  const config = app.get(BotServiceConfigService);
  const port = config.port;

  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(createJsonLogLine({
    level: 'info',
    service: SERVICE_NAME,
    message: `${SERVICE_NAME} listening on port ${port}`,
    correlationId: 'system',
    metadata: { port },
  }));
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(createJsonLogLine({
    level: 'error',
    service: SERVICE_NAME,
    message: `Failed to start ${SERVICE_NAME}`,
    correlationId: 'system',
    error,
  }));
  process.exitCode = 1;
});
