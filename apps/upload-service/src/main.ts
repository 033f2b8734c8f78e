/**
 * File Intake Upload Service
 * Validated multipart uploads handed to storage
 * Port 8004
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Upload Service');
  const app = await NestFactory.create(AppModule);

  // Enable CORS for client applications
  const corsOrigin = process.env.CORS_ORIGIN;
  if (!corsOrigin) {
    throw new Error(
      'CORS_ORIGIN environment variable must be set for upload service',
    );
  }

  app.enableCors({
    origin: corsOrigin,
    credentials: true,
  });

  const port = app.get(ConfigService).getOrThrow<number>('uploadServicePort');
  await app.listen(port);

  logger.log(`Upload Service listening on port ${port}`);
}

bootstrap().catch((error: Error) => {
  const logger = new Logger('Bootstrap');
  logger.error('Failed to start Upload Service', error.stack);
  process.exit(1);
});
