import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ServiceInfoQuery } from './application/system/service-info.query';
import {
  BOT_SERVICE_ENV_FILE_PATHS,
  validateBotServiceEnvironment,
} from './infrastructure/config/bot-service-config.service';
import { AppController } from './presentation/http/app.controller';
import { QueueConsumptionModule } from './queue-consumption.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: BOT_SERVICE_ENV_FILE_PATHS,
      validate: validateBotServiceEnvironment,
    }),
    QueueConsumptionModule,
  ],
  controllers: [AppController],
  providers: [ServiceInfoQuery],
})
export class AppModule {}
