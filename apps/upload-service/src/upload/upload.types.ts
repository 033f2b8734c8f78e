/**
 * Upload Types
 * Request, outcome and result shapes of the intake core
 */

import { Readable } from 'stream';
import { ServiceError } from '@intake/common/errors';

export interface UploadRequest {
  title: string;
  tags: string[];
  description: string;
  fileName: string;
  fileSize: number; // bytes
  fileContent: Readable | null;
}

/**
 * Fields reported by validation, in declaration order
 */
export enum UploadField {
  Title = 'Title',
  Tags = 'Tags',
  Description = 'Description',
  File = 'File',
}

export const UPLOAD_FIELD_ORDER: readonly UploadField[] = [
  UploadField.Title,
  UploadField.Tags,
  UploadField.Description,
  UploadField.File,
];

/**
 * A valid outcome carries the file content the checks found present
 */
export type ValidationOutcome =
  | { valid: true; fileContent: Readable }
  | { valid: false; fields: UploadField[] };

export interface UploadResult {
  identifier: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type DispatchResult = Result<UploadResult, ServiceError>;
