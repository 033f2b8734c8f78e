/**
 * Storage Module
 * Default UploadStorage binding: local disk
 */

import { Module } from '@nestjs/common';
import { SettingsModule } from '../settings/settings.module';
import { UPLOAD_STORAGE } from '../upload/ports/upload-storage.port';
import { DiskUploadStorage } from './disk-upload-storage.service';

@Module({
  imports: [SettingsModule],
  providers: [
    {
      provide: UPLOAD_STORAGE,
      useClass: DiskUploadStorage,
    },
  ],
  exports: [UPLOAD_STORAGE],
})
export class StorageModule {}
