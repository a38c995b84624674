import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { IngestApplicationService } from './application/ingest/ingest.application.service';
import { LOG_RECORD_PUBLISHER } from './application/ingest/ports/log-record-publisher.port';
import { ServiceInfoQuery } from './application/system/service-info.query';
import {
  INTAKE_SERVICE_ENV_FILE_PATHS,
  IntakeServiceConfigService,
  validateIntakeServiceEnvironment,
} from './infrastructure/config/intake-service-config.service';
import { RabbitMqLogRecordPublisherAdapter } from './infrastructure/messaging/rabbitmq-log-record-publisher.adapter';
import { IngestController } from './presentation/http/ingest/ingest.controller';
import { AppController } from './presentation/http/system/app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: INTAKE_SERVICE_ENV_FILE_PATHS,
      validate: validateIntakeServiceEnvironment,
    }),
  ],
  controllers: [AppController, IngestController],
  providers: [
    IntakeServiceConfigService,
    ServiceInfoQuery,
    IngestApplicationService,
    RabbitMqLogRecordPublisherAdapter,
    {
      provide: LOG_RECORD_PUBLISHER,
      useExisting: RabbitMqLogRecordPublisherAdapter,
    },
  ],
})
export class AppModule {}
