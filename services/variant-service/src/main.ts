import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { createJsonLogEntry, SYSTEM_CORRELATION_ID } from '@image-variants/shared';
import { AppModule } from './app.module';
import { VARIANT_SERVICE_NAME } from './application/system/service-info.query';
import { VariantServiceConfigService } from './infrastructure/config/variant-service-config.service';
import { HttpExceptionFilter } from './presentation/http/common/http-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();
  const config = app.get(VariantServiceConfigService);
  const port = config.port;

  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(JSON.stringify(createJsonLogEntry({
    level: 'info',
    service: VARIANT_SERVICE_NAME,
    message: `${VARIANT_SERVICE_NAME} listening on port ${port}`,
    correlationId: SYSTEM_CORRELATION_ID,
    metadata: { port, bucketConfigured: Boolean(config.storageBucket) },
  })));
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(JSON.stringify(createJsonLogEntry({
    level: 'error',
    service: VARIANT_SERVICE_NAME,
    message: `Failed to start ${VARIANT_SERVICE_NAME}`,
    correlationId: SYSTEM_CORRELATION_ID,
    error,
  })));
  process.exitCode = 1;
});
