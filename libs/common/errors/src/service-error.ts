import { ErrorCode } from './error-codes';

export interface ServiceErrorOptions {
  code: ErrorCode;
  details: string;
  httpStatusCode: number;
  originalError?: Error;
  metadata?: Record<string, unknown>;
}

export interface ServiceErrorBody {
  Code: ErrorCode;
  Details: string;
}

export class ServiceError extends Error {
  readonly code: ErrorCode;
  readonly details: string;
  readonly httpStatusCode: number;
  readonly originalError?: Error;
  readonly metadata?: Record<string, unknown>;

  constructor(options: ServiceErrorOptions) {
    super(options.details);
    this.name = 'ServiceError';
    this.code = options.code;
    this.details = options.details;
    this.httpStatusCode = options.httpStatusCode;
    this.originalError = options.originalError;
    this.metadata = options.metadata;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Client-facing body; the original error never leaves the process
   */
  toJSON(): ServiceErrorBody {
    return {
      Code: this.code,
      Details: this.details,
    };
  }
}
