/**
 * Service Error Filter
 * Renders a ServiceError as { Code, Details } with its HTTP status.
 * The original cause is logged, never sent.
 */

import { ExceptionFilter, Catch, ArgumentsHost, Logger } from '@nestjs/common';
import { Response } from 'express';
import { ServiceError } from './service-error';

@Catch(ServiceError)
export class ServiceErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(ServiceErrorFilter.name);

  catch(exception: ServiceError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    this.logger.warn(
      `${exception.code}: ${exception.details}`,
      exception.originalError?.stack,
    );

    response.status(exception.httpStatusCode).json(exception.toJSON());
  }
}
