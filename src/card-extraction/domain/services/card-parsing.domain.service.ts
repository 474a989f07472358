import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { LoggerExtractionDiagnostics } from '../../diagnostics/logger-extraction.diagnostics';
import {
  ExtractionRecord,
  isEmptyRecord,
  ValidationResult,
} from '../entities/extraction-record.entity';
import { RecordParser } from '../parsing/record-parser';
import { RecordValidator } from '../parsing/record-validator';

/**
 * Card Parsing Domain Service
 *
 * Holds the parser and validator configured for the active field set and
 * date defaults. Both are pure apart from diagnostics logging.
 */
@Injectable()
export class CardParsingDomainService {
  private readonly parser: RecordParser;
  private readonly validator: RecordValidator;

  constructor(configService: ConfigService<AllConfigType>) {
    const fields = configService.getOrThrow('cardExtraction.fields', {
      infer: true,
    });
    const dateDefaults = configService.getOrThrow('cardExtraction.dateDefaults', {
      infer: true,
    });
    const diagnostics = new LoggerExtractionDiagnostics();

    this.parser = new RecordParser(diagnostics, { fields, dateDefaults });
    this.validator = new RecordValidator(diagnostics, { fields });
  }

  parse(text: string): ExtractionRecord {
    return this.parser.parse(text);
  }

  validate(record: ExtractionRecord): ValidationResult {
    return this.validator.validate(record);
  }

  isEmpty(record: ExtractionRecord): boolean {
    return isEmptyRecord(record);
  }
}
