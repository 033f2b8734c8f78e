/**
 * Upload Service Root Module
 * Configures file intake
 */

import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { IntakeConfigModule } from '@intake/common/config';
import { ServiceErrorFilter } from '@intake/common/errors';
import { UploadModule } from './upload/upload.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    // Configuration
    IntakeConfigModule,

    // Feature modules
    UploadModule,
  ],
  controllers: [HealthController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: ServiceErrorFilter,
    },
  ],
})
export class AppModule {}
