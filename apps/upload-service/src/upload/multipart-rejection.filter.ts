/**
 * Multipart Rejection Filter
 * The file interceptor turns multer limit errors into Bad Request and
 * Payload Too Large exceptions. On the upload route they all concern the
 * file part, so they are answered as a File validation failure.
 */

import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  Logger,
  PayloadTooLargeException,
} from '@nestjs/common';
import { Response } from 'express';
import { ERRORS } from '@intake/common/errors';
import { UploadField } from './upload.types';

@Catch(BadRequestException, PayloadTooLargeException)
export class MultipartRejectionFilter implements ExceptionFilter {
  private readonly logger = new Logger(MultipartRejectionFilter.name);

  catch(exception: BadRequestException | PayloadTooLargeException, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const error = ERRORS.ValidationError([UploadField.File]);

    this.logger.warn(`Upload rejected while parsing: ${exception.message}`);

    response.status(error.httpStatusCode).json(error.toJSON());
  }
}
