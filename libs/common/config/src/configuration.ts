/**
 * File Intake Configuration
 * Environment variables, validated when the config module loads
 */

import { IsInt, IsNotEmpty, IsString, Matches, Max, Min, validateSync } from 'class-validator';
import { plainToInstance } from 'class-transformer';

export interface IntakeConfig {
  uploadServicePort: number;
  maxFileSizeForUpload: string;
  uploadDirectory: string;
}

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @Max(65535)
  UPLOAD_SERVICE_PORT!: number;

  // Parsed by FileSize.parse, e.g. "2MB"
  @IsString()
  @Matches(/^\s*\d+\s*(b|kb|mb|gb)\s*$/i)
  UPLOAD_MAX_FILE_SIZE!: string;

  @IsString()
  @IsNotEmpty()
  UPLOAD_DIRECTORY!: string;
}

export default (): IntakeConfig => {
  const validatedConfig = plainToInstance(
    EnvironmentVariablesValidator,
    {
      UPLOAD_SERVICE_PORT: Number(process.env.UPLOAD_SERVICE_PORT || '8004'),
      UPLOAD_MAX_FILE_SIZE: process.env.UPLOAD_MAX_FILE_SIZE || '2MB',
      UPLOAD_DIRECTORY: process.env.UPLOAD_DIRECTORY || '/data/uploads',
    },
  );

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(`Configuration validation error: ${errors.toString()}`);
  }

  return {
    uploadServicePort: validatedConfig.UPLOAD_SERVICE_PORT,
    maxFileSizeForUpload: validatedConfig.UPLOAD_MAX_FILE_SIZE,
    uploadDirectory: validatedConfig.UPLOAD_DIRECTORY,
  };
};
