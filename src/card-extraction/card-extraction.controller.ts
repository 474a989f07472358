import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Post,
  StreamableFile,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FileInterceptor } from '@nestjs/platform-express';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiConsumes,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiProduces,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { createReadStream } from 'fs';
import { AllConfigType } from '../config/config.type';
import { CardExtractionService } from './card-extraction.service';
import { SpreadsheetPort } from './domain/ports/spreadsheet.port';
import { ExtractionRecordResponseDto } from './dto/extraction-record-response.dto';
import { ParseExtractionDto } from './dto/parse-extraction.dto';
import { ParseExtractionResponseDto } from './dto/parse-extraction-response.dto';
import { ProcessCardResponseDto } from './dto/process-card-response.dto';
import { SUPPORTED_MIME_TYPES } from './infrastructure/images/image-encoding.util';

const XLSX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

/**
 * Card Extraction Controller
 *
 * Privacy:
 * - Rate limited
 * - Uploads are processed in memory and never written to disk
 * - Error messages carry no field values
 */
@ApiTags('Cards')
@Controller({ path: 'cards', version: '1' })
export class CardExtractionController {
  constructor(
    private readonly cardExtractionService: CardExtractionService,
    @Inject('SpreadsheetPort')
    private readonly spreadsheet: SpreadsheetPort,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  @Post('process')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 10, ttl: 60000 } }) // 10 uploads per minute
  @ApiOperation({
    summary: 'Extract fields from a medical card image and append them to the workbook',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        file: {
          type: 'string',
          format: 'binary',
          description: 'Card image (JPEG, PNG)',
        },
      },
      required: ['file'],
    },
  })
  @ApiOkResponse({ type: ProcessCardResponseDto })
  @ApiBadRequestResponse({
    description: 'Invalid file, unreadable card or failed validation',
  })
  @ApiResponse({ status: 429, description: 'Too many requests' })
  @ApiResponse({ status: 503, description: 'Vision model not configured' })
  @UseInterceptors(
    FileInterceptor('file', {
      fileFilter: (req, file, callback) => {
        if (!SUPPORTED_MIME_TYPES.includes(file.mimetype)) {
          return callback(
            new BadRequestException(
              `Invalid file type. Allowed types: ${SUPPORTED_MIME_TYPES.join(', ')}`,
            ),
            false,
          );
        }
        callback(null, true);
      },
    }),
  )
  async process(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<ProcessCardResponseDto> {
    if (!file) {
      throw new BadRequestException('No file uploaded');
    }

    const result = await this.cardExtractionService.processUpload(
      file.buffer,
      file.originalname,
      file.mimetype,
    );

    const response = new ProcessCardResponseDto();
    response.extractedText = result.extractedText;
    response.record = ExtractionRecordResponseDto.fromRecord(result.record);
    response.isValid = result.validation.isValid;
    response.messages = result.validation.messages;
    response.excelUrl = this.downloadUrl();
    return response;
  }

  @Post('parse')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Parse and validate vision model reply text without calling the model',
  })
  @ApiOkResponse({ type: ParseExtractionResponseDto })
  @ApiBadRequestResponse({ description: 'Missing or oversized text' })
  parse(@Body() dto: ParseExtractionDto): ParseExtractionResponseDto {
    const result = this.cardExtractionService.parseText(dto.text);

    const response = new ParseExtractionResponseDto();
    response.record = ExtractionRecordResponseDto.fromRecord(result.record);
    response.isValid = result.validation.isValid;
    response.messages = result.validation.messages;
    return response;
  }

  @Get('download')
  @ApiOperation({ summary: 'Download the workbook' })
  @ApiProduces(XLSX_MIME_TYPE)
  @ApiOkResponse({ description: 'medical_data.xlsx' })
  @ApiNotFoundResponse({ description: 'No workbook has been written yet' })
  async download(): Promise<StreamableFile> {
    if (!(await this.spreadsheet.outputExists())) {
      throw new NotFoundException('Excel file not found');
    }

    return new StreamableFile(
      createReadStream(this.spreadsheet.getOutputPath()),
      {
        type: XLSX_MIME_TYPE,
        disposition: 'attachment; filename="medical_data.xlsx"',
      },
    );
  }

  private downloadUrl(): string {
    const prefix = this.configService.get('app.apiPrefix', { infer: true }) ?? 'api';
    return `/${prefix}/v1/cards/download`;
  }
}
