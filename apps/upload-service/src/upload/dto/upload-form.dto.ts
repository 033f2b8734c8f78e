/**
 * Upload Form DTO
 * Constraints on the text fields of an upload request
 */

import {
  ArrayNotEmpty,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class UploadFormDto {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  tags!: string[];

  @IsOptional()
  @IsString()
  @MaxLength(500)
  description?: string;
}
