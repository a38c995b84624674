import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { formatJsonLogLine, HttpExceptionFilter } from '@log-ingest/shared';
import { AppModule } from './app.module';
import { WorkerServiceConfigService } from './infrastructure/config/worker-service-config.service';
import { mapWorkerDomainError } from './presentation/http/common/worker-error.mapper';

const SERVICE_NAME = 'worker-service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalFilters(new HttpExceptionFilter(SERVICE_NAME, mapWorkerDomainError));
  const config = app.get(WorkerServiceConfigService);
  const port = config.port;

  app.enableShutdownHooks();
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(formatJsonLogLine({
    level: 'info',
    service: SERVICE_NAME,
    message: `${SERVICE_NAME} listening on port ${port}`,
    metadata: {
      port,
      tenantStoreDriver: config.tenantStoreDriver,
      consumerEnabled: config.consumerEnabled,
    },
  }));
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(formatJsonLogLine({
    level: 'error',
    service: SERVICE_NAME,
    message: `Failed to start ${SERVICE_NAME}`,
    error,
  }));
  process.exitCode = 1;
});
