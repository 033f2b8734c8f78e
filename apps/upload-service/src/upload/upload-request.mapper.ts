/**
 * Upload Request Mapper
 * Multipart form fields and the multer file -> UploadRequest
 */

import { Readable } from 'stream';
import { UploadRequest } from './upload.types';

/**
 * Text fields as they arrive on req.body. Multer turns bracketed field
 * names such as "title[x]" into objects and a JSON body can carry any
 * value, so nothing here is trusted to be a string.
 */
export interface UploadFormBody {
  title?: unknown;
  tags?: unknown;
  description?: unknown;
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * First value of a possibly repeated field; anything but a string is ''
 */
function firstValue(value: unknown): string {
  const first: unknown = Array.isArray(value) ? value[0] : value;
  return isString(first) ? first : '';
}

/**
 * "Hans,Wurst" and repeated tags fields both give ['Hans', 'Wurst']
 */
export function parseTags(value: unknown): string[] {
  const raw: unknown[] = Array.isArray(value) ? value : [value];
  return raw
    .filter(isString)
    .flatMap((entry) => entry.split(','))
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export function toUploadRequest(
  body: UploadFormBody | undefined,
  file: Express.Multer.File | undefined,
): UploadRequest {
  return {
    title: firstValue(body?.title),
    tags: parseTags(body?.tags),
    description: firstValue(body?.description),
    fileName: file?.originalname ?? '',
    fileSize: file?.size ?? 0,
    fileContent: file ? Readable.from(file.buffer) : null,
  };
}
