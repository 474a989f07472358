import {
  BadRequestException,
  HttpStatus,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { describeError } from '../utils/phi-sanitizer.util';
import {
  ExtractionRecord,
  ProcessedCard,
  ValidationResult,
} from './domain/entities/extraction-record.entity';
import { EncodedImage } from './domain/ports/image-source.port';
import { SpreadsheetPort } from './domain/ports/spreadsheet.port';
import { VisionModelPort } from './domain/ports/vision-model.port';
import { CardParsingDomainService } from './domain/services/card-parsing.domain.service';
import { encodeImageBuffer } from './infrastructure/images/image-encoding.util';

export interface ParsedText {
  record: ExtractionRecord;
  validation: ValidationResult;
}

export interface ProcessedUpload extends ParsedText {
  extractedText: string;
  outputPath: string;
}

/**
 * Card Extraction Service
 *
 * Orchestrates one card: vision model, parser, validator, spreadsheet.
 *
 * Privacy:
 * - Logs filenames and counts only; never model text or field values
 */
@Injectable()
export class CardExtractionService {
  private readonly logger = new Logger(CardExtractionService.name);

  constructor(
    @Inject('VisionModelPort')
    private readonly visionModel: VisionModelPort,
    @Inject('SpreadsheetPort')
    private readonly spreadsheet: SpreadsheetPort,
    private readonly parsing: CardParsingDomainService,
  ) {}

  /**
   * Batch path: extract and parse one image. Failures are logged and
   * reported as null; a record that fails validation is still returned.
   */
  async processImage(image: EncodedImage): Promise<ProcessedCard | null> {
    let text: string | null;
    try {
      text = await this.visionModel.extractText(image);
    } catch (error) {
      this.logger.error(
        `[PROCESS] Vision request failed for ${image.filename}: ${describeError(error)}`,
      );
      return null;
    }

    if (!text) {
      this.logger.error(
        `[PROCESS] Failed to extract text from image ${image.filename}`,
      );
      return null;
    }

    const record = this.parsing.parse(text);
    if (this.parsing.isEmpty(record)) {
      this.logger.error(
        `[PROCESS] Failed to parse extraction result for image ${image.filename}`,
      );
      return null;
    }

    const validation = this.parsing.validate(record);
    if (!validation.isValid) {
      this.logger.warn(
        `[PROCESS] Validation failed for ${image.filename} with ${validation.messages.length} issue(s); keeping record`,
      );
    }

    this.logger.log(`[PROCESS] Processed ${image.filename}`);
    return { ...record, imageFilename: image.filename };
  }

  /**
   * Upload path: extract, parse, validate and append to the workbook.
   * @throws ServiceUnavailableException when no vision model is configured
   * @throws BadRequestException when nothing usable was read or validation fails
   * @throws InternalServerErrorException when the workbook cannot be saved
   */
  async processUpload(
    buffer: Buffer,
    filename: string,
    mimeType: string,
  ): Promise<ProcessedUpload> {
    if (!this.visionModel.isConfigured()) {
      throw new ServiceUnavailableException('Vision model API key is not configured');
    }

    const image = encodeImageBuffer(buffer, filename, mimeType);
    const extractedText = await this.visionModel.extractText(image);
    if (!extractedText) {
      throw new BadRequestException('Failed to extract text from image');
    }

    const record = this.parsing.parse(extractedText);
    if (this.parsing.isEmpty(record)) {
      throw new BadRequestException('Failed to parse extracted text');
    }

    const validation = this.parsing.validate(record);
    if (!validation.isValid) {
      throw new BadRequestException({
        status: HttpStatus.BAD_REQUEST,
        message: 'Data validation failed',
        errors: validation.messages,
      });
    }

    let outputPath: string;
    try {
      outputPath = await this.spreadsheet.appendRecords([
        { ...record, imageFilename: filename },
      ]);
    } catch (error) {
      this.logger.error(
        `[PROCESS] Failed to save workbook: ${describeError(error)}`,
      );
      throw new InternalServerErrorException('Failed to save Excel file');
    }

    this.logger.log(`[PROCESS] Upload ${filename} saved`);
    return { extractedText, record, validation, outputPath };
  }

  /** Parse and validate reply text without calling the model */
  parseText(text: string): ParsedText {
    const record = this.parsing.parse(text);
    return { record, validation: this.parsing.validate(record) };
  }
}
