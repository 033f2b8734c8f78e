/**
 * Upload Module
 * Request intake: validation and dispatch to UploadStorage
 */

import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { APPLICATION_SETTINGS, ApplicationSettings } from '../settings/application-settings';
import { SettingsModule } from '../settings/settings.module';
import { StorageModule } from '../storage/storage.module';
import { UploadController } from './upload.controller';
import { UploadDispatcher } from './upload.dispatcher';
import { RequestValidator } from './request-validator';

@Module({
  imports: [
    SettingsModule,
    StorageModule,
    MulterModule.registerAsync({
      imports: [SettingsModule],
      inject: [APPLICATION_SETTINGS],
      useFactory: (settings: ApplicationSettings) => ({
        storage: memoryStorage(),
        limits: {
          // One byte of headroom: a file just over the limit still reaches
          // the validator, anything larger is cut off by multer
          fileSize: settings.maxFileSizeForUpload.toBytes() + 1,
          files: 1,
        },
      }),
    }),
  ],
  controllers: [UploadController],
  providers: [UploadDispatcher, RequestValidator],
  exports: [UploadDispatcher],
})
export class UploadModule {}
