/**
 * File Intake Config Module
 * Loads and validates the upload service environment once; ConfigService
 * is global so the settings module can read the size limit and directory
 */

import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

@Module({
  imports: [
    NestConfigModule.forRoot({
      load: [configuration],
      isGlobal: true,
      cache: true,
    }),
  ],
  exports: [NestConfigModule],
})
export class IntakeConfigModule {}
