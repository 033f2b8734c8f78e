/**
 * Upload Controller
 * POST /file/upload, multipart fields: file, title, tags, description
 */

import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UploadedFile,
  UseFilters,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { UploadDispatcher } from './upload.dispatcher';
import { UploadFormBody, toUploadRequest } from './upload-request.mapper';
import { UploadResponseDto } from './dto/upload-response.dto';
import { MultipartRejectionFilter } from './multipart-rejection.filter';

@Controller('file')
export class UploadController {
  constructor(private uploadDispatcher: UploadDispatcher) {}

  /**
   * Multer limits come from UploadModule; the interceptor must not pass
   * its own, which would replace them wholesale
   */
  @Post('upload')
  @UseInterceptors(FileInterceptor('file'))
  @UseFilters(MultipartRejectionFilter)
  @HttpCode(HttpStatus.OK)
  async upload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: UploadFormBody,
  ): Promise<UploadResponseDto> {
    const result = await this.uploadDispatcher.dispatch(toUploadRequest(body, file));

    if (!result.ok) {
      throw result.error;
    }

    return { Identifier: result.value.identifier };
  }
}
