import { RecordField } from '../domain/enums/record-field.enum';
import { DateDefaults } from '../domain/parsing/field-normalizers';

export type CardExtractionConfig = {
  openRouter: {
    apiKey: string | null;
    apiUrl: string;
    model: string;
    maxTokens: number;
    temperature: number;
    rateLimitMaxRetries: number;
  };
  fields: RecordField[];
  dateDefaults: DateDefaults;
  imageDir: string;
  excelTemplate: string;
  excelOutput: string;
  requestDelayMs: number;
  maxFileSizeMb: number;
};
