import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { formatJsonLogLine, HttpExceptionFilter } from '@log-ingest/shared';
import { AppModule } from './app.module';
import { IntakeServiceConfigService } from './infrastructure/config/intake-service-config.service';
import { mapIntakeDomainError } from './presentation/http/common/intake-error.mapper';

const SERVICE_NAME = 'intake-service';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bodyParser: false });
  const config = app.get(IntakeServiceConfigService);

  // JSON is parsed by the service itself so malformed bodies get the same error shape.
  app.useBodyParser('text', {
    type: ['application/json', 'text/plain'],
    limit: config.bodyLimit,
  });
  app.useGlobalFilters(new HttpExceptionFilter(SERVICE_NAME, mapIntakeDomainError));

  const port = config.port;
  app.enableShutdownHooks();
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(formatJsonLogLine({
    level: 'info',
    service: SERVICE_NAME,
    message: `${SERVICE_NAME} listening on port ${port}`,
    metadata: { port },
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
