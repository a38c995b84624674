import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ProcessLogDeliveryUseCase } from './application/processing/process-log-delivery.use-case';
import { PROCESSING_DELAY_STRATEGY } from './application/processing/ports/processing-delay.port';
import { TENANT_STORE } from './application/processing/ports/tenant-store.port';
import { ServiceInfoQuery } from './application/system/service-info.query';
import { ProcessedLogsQuery } from './application/tenants/processed-logs.query';
import {
  WORKER_SERVICE_ENV_FILE_PATHS,
  WorkerServiceConfigService,
  validateWorkerServiceEnvironment,
} from './infrastructure/config/worker-service-config.service';
import { createTenantStore } from './infrastructure/persistence/tenant-store.factory';
import { LengthProportionalDelayStrategy } from './infrastructure/processing/length-proportional-delay.strategy';
import { PushDeliveryController } from './presentation/http/delivery/push-delivery.controller';
import { AppController } from './presentation/http/system/app.controller';
import { ProcessedLogsController } from './presentation/http/tenants/processed-logs.controller';
import { RabbitMqLogRecordConsumerService } from './presentation/messaging/rabbitmq-log-record-consumer.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: WORKER_SERVICE_ENV_FILE_PATHS,
      validate: validateWorkerServiceEnvironment,
    }),
  ],
  controllers: [AppController, PushDeliveryController, ProcessedLogsController],
  providers: [
    WorkerServiceConfigService,
    ServiceInfoQuery,
    {
      provide: TENANT_STORE,
      useFactory: createTenantStore,
      inject: [WorkerServiceConfigService],
    },
    {
      provide: PROCESSING_DELAY_STRATEGY,
      useFactory: (config: WorkerServiceConfigService) =>
        new LengthProportionalDelayStrategy(config.processingMsPerChar),
      inject: [WorkerServiceConfigService],
    },
    ProcessLogDeliveryUseCase,
    ProcessedLogsQuery,
    RabbitMqLogRecordConsumerService,
  ],
})
export class AppModule {}
