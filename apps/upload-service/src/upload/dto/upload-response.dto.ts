/**
 * Upload Response DTO
 */

export class UploadResponseDto {
  Identifier!: string;
}
