import { ErrorCode } from './error-codes';
import { ServiceError } from './service-error';

export const ERRORS = {
  ValidationError: (fields: readonly string[]) =>
    new ServiceError({
      code: ErrorCode.ValidationError,
      details: `Validation failed. Properties: (${fields.join(', ')})`,
      httpStatusCode: 400,
      metadata: { fields: [...fields] },
    }),

  InternalError: (message: string, e?: Error) =>
    new ServiceError({
      code: ErrorCode.InternalError,
      details: message || 'Internal server error',
      httpStatusCode: 500,
      originalError: e,
    }),
};
