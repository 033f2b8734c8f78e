/**
 * Upload Dispatcher
 * validate -> store -> result, one outcome per request
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ERRORS } from '@intake/common/errors';
import { APPLICATION_SETTINGS, ApplicationSettings } from '../settings/application-settings';
import { UPLOAD_STORAGE, UploadStorage } from './ports/upload-storage.port';
import { RequestValidator } from './request-validator';
import { DispatchResult, UploadRequest } from './upload.types';

export const STORE_FAILED_MESSAGE = 'An internal error occurred while storing the file.';

@Injectable()
export class UploadDispatcher {
  private readonly logger = new Logger(UploadDispatcher.name);

  constructor(
    private requestValidator: RequestValidator,
    @Inject(APPLICATION_SETTINGS) private settings: ApplicationSettings,
    @Inject(UPLOAD_STORAGE) private storage: UploadStorage,
  ) {}

  async dispatch(request: UploadRequest): Promise<DispatchResult> {
    const limit = this.settings.maxFileSizeForUpload;
    const outcome = this.requestValidator.validate(request, limit);

    if (!outcome.valid) {
      this.logger.warn(
        `Upload rejected: invalid ${outcome.fields.join(', ')} (limit ${limit})`,
      );
      return { ok: false, error: ERRORS.ValidationError(outcome.fields) };
    }

    try {
      const identifier = await this.storage.store(request.fileName, outcome.fileContent);

      this.logger.log(
        `Upload stored: ${request.fileName} (${request.fileSize} bytes) as ${identifier}`,
      );

      return { ok: true, value: { identifier } };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Failed to store ${request.fileName}: ${cause.message}`,
        cause.stack,
      );
      return { ok: false, error: ERRORS.InternalError(STORE_FAILED_MESSAGE, cause) };
    }
  }
}
