import { registerAs } from '@nestjs/config';
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { parseFieldSet } from '../domain/enums/record-field.enum';
import { CardExtractionConfig } from './card-extraction-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  @IsOptional()
  OPENROUTER_API_KEY?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  OPENROUTER_API_URL?: string;

  @IsString()
  @IsOptional()
  CARD_EXTRACTION_MODEL?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  CARD_EXTRACTION_MAX_TOKENS?: number;

  @IsNumber()
  @Min(0)
  @Max(2)
  @IsOptional()
  CARD_EXTRACTION_TEMPERATURE?: number;

  @IsString()
  @IsOptional()
  CARD_EXTRACTION_FIELDS?: string;

  // Ethiopian calendar: 13 months
  @IsInt()
  @Min(1)
  @Max(13)
  @IsOptional()
  CARD_EXTRACTION_DEFAULT_DATE_MONTH?: number;

  @IsInt()
  @Min(1000)
  @Max(9999)
  @IsOptional()
  CARD_EXTRACTION_DEFAULT_DATE_YEAR?: number;

  @IsString()
  @IsOptional()
  CARD_EXTRACTION_IMAGE_DIR?: string;

  @IsString()
  @IsOptional()
  CARD_EXTRACTION_EXCEL_TEMPLATE?: string;

  @IsString()
  @IsOptional()
  CARD_EXTRACTION_EXCEL_OUTPUT?: string;

  @IsInt()
  @Min(0)
  @IsOptional()
  CARD_EXTRACTION_REQUEST_DELAY_MS?: number;

  @IsInt()
  @Min(0)
  @Max(10)
  @IsOptional()
  CARD_EXTRACTION_RATE_LIMIT_MAX_RETRIES?: number;

  @IsInt()
  @Min(1)
  @Max(100)
  @IsOptional()
  CARD_EXTRACTION_MAX_FILE_SIZE_MB?: number;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw ? parseInt(raw, 10) : fallback;
}

export default registerAs<CardExtractionConfig>('cardExtraction', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    openRouter: {
      apiKey: process.env.OPENROUTER_API_KEY || null,
      apiUrl:
        process.env.OPENROUTER_API_URL ||
        'https://openrouter.ai/api/v1/chat/completions',
      model: process.env.CARD_EXTRACTION_MODEL || 'google/gemini-2.0-flash-001',
      maxTokens: intFromEnv('CARD_EXTRACTION_MAX_TOKENS', 300),
      temperature: process.env.CARD_EXTRACTION_TEMPERATURE
        ? parseFloat(process.env.CARD_EXTRACTION_TEMPERATURE)
        : 0.1,
      rateLimitMaxRetries: intFromEnv('CARD_EXTRACTION_RATE_LIMIT_MAX_RETRIES', 3),
    },
    fields: parseFieldSet(process.env.CARD_EXTRACTION_FIELDS),
    dateDefaults: {
      month: intFromEnv('CARD_EXTRACTION_DEFAULT_DATE_MONTH', 1),
      year: intFromEnv('CARD_EXTRACTION_DEFAULT_DATE_YEAR', 2017),
    },
    imageDir: process.env.CARD_EXTRACTION_IMAGE_DIR || 'images',
    excelTemplate: process.env.CARD_EXTRACTION_EXCEL_TEMPLATE || 'template.xlsx',
    excelOutput:
      process.env.CARD_EXTRACTION_EXCEL_OUTPUT ||
      'output/medical_cards_export.xlsx',
    requestDelayMs: intFromEnv('CARD_EXTRACTION_REQUEST_DELAY_MS', 1000),
    maxFileSizeMb: intFromEnv('CARD_EXTRACTION_MAX_FILE_SIZE_MB', 10),
  };
});
