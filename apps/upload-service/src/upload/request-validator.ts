/**
 * Request Validator
 * Checks an upload request against the size limit and required fields
 * before anything is handed to storage. All checks run; failures are
 * reported together in field declaration order.
 */

import { Injectable } from '@nestjs/common';
import { Readable } from 'stream';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { FileSize } from '@intake/common/types';
import { UploadFormDto } from './dto/upload-form.dto';
import {
  UPLOAD_FIELD_ORDER,
  UploadField,
  UploadRequest,
  ValidationOutcome,
} from './upload.types';

const FORM_FIELDS: Record<string, UploadField> = {
  title: UploadField.Title,
  tags: UploadField.Tags,
  description: UploadField.Description,
};

@Injectable()
export class RequestValidator {
  validate(request: UploadRequest, limit: FileSize): ValidationOutcome {
    const failed = new Set<UploadField>();

    const form = plainToInstance(UploadFormDto, {
      title: request.title.trim(),
      tags: request.tags.map((tag) => tag.trim()),
      description: request.description,
    });

    for (const error of validateSync(form)) {
      const field = FORM_FIELDS[error.property];
      if (field) {
        failed.add(field);
      }
    }

    const fileContent = this.acceptedContent(request, limit);
    if (!fileContent) {
      failed.add(UploadField.File);
    }

    if (fileContent && failed.size === 0) {
      return { valid: true, fileContent };
    }

    return {
      valid: false,
      fields: UPLOAD_FIELD_ORDER.filter((field) => failed.has(field)),
    };
  }

  /**
   * An empty file counts as no file
   */
  private acceptedContent(request: UploadRequest, limit: FileSize): Readable | null {
    if (!request.fileContent || request.fileSize <= 0) {
      return null;
    }
    return request.fileSize <= limit.toBytes() ? request.fileContent : null;
  }
}
