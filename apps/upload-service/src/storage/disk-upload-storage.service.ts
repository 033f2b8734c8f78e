/**
 * Disk Upload Storage
 * Writes each upload to <uploadDirectory>/<uuid> and returns the uuid
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { createWriteStream } from 'fs';
import { randomUUID } from 'crypto';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { APPLICATION_SETTINGS, ApplicationSettings } from '../settings/application-settings';
import { UploadStorage } from '../upload/ports/upload-storage.port';

@Injectable()
export class DiskUploadStorage implements UploadStorage {
  private readonly logger = new Logger(DiskUploadStorage.name);

  constructor(@Inject(APPLICATION_SETTINGS) private settings: ApplicationSettings) {}

  async store(name: string, content: Readable): Promise<string> {
    const identifier = randomUUID();
    const directory = this.settings.uploadDirectory;
    const fullPath = path.join(directory, identifier);

    // Ensure directory exists
    await fs.mkdir(directory, { recursive: true });

    // Exclusive create: an identifier never overwrites an earlier upload
    try {
      await pipeline(content, createWriteStream(fullPath, { flags: 'wx' }));
    } catch (error) {
      // No partial uploads left behind
      await fs.rm(fullPath, { force: true });
      throw error;
    }

    const stats = await fs.stat(fullPath);

    this.logger.log(`File written: ${name} -> ${identifier} (${stats.size} bytes)`);

    return identifier;
  }
}
