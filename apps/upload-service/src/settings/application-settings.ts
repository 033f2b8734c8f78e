/**
 * Application Settings
 * Read-only accessor over the loaded configuration
 */

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FileSize } from '@intake/common/types';

export const APPLICATION_SETTINGS = Symbol('APPLICATION_SETTINGS');

export interface ApplicationSettings {
  readonly maxFileSizeForUpload: FileSize;
  readonly uploadDirectory: string;
}

@Injectable()
export class ConfigApplicationSettings implements ApplicationSettings {
  readonly maxFileSizeForUpload: FileSize;
  readonly uploadDirectory: string;

  constructor(private configService: ConfigService) {
    this.maxFileSizeForUpload = FileSize.parse(
      this.configService.getOrThrow<string>('maxFileSizeForUpload'),
    );
    this.uploadDirectory = this.configService.getOrThrow<string>('uploadDirectory');
  }
}
