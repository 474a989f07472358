import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { AllConfigType } from '../config/config.type';
import { describeError } from '../utils/phi-sanitizer.util';
import { sleep } from '../utils/sleep';
import { CardExtractionService } from './card-extraction.service';
import { ProcessedCard } from './domain/entities/extraction-record.entity';
import { ImageSourcePort } from './domain/ports/image-source.port';
import { SpreadsheetPort } from './domain/ports/spreadsheet.port';
import { VisionModelPort } from './domain/ports/vision-model.port';

export interface BatchSummary {
  total: number;
  processed: number;
  failed: number;
  outputPath: string | null;
}

/**
 * Runs every image in the configured directory through extraction and
 * appends the results to the workbook in one write.
 */
@Injectable()
export class CardBatchService {
  private readonly logger = new Logger(CardBatchService.name);

  constructor(
    @Inject('ImageSourcePort')
    private readonly imageSource: ImageSourcePort,
    @Inject('SpreadsheetPort')
    private readonly spreadsheet: SpreadsheetPort,
    @Inject('VisionModelPort')
    private readonly visionModel: VisionModelPort,
    private readonly cardExtractionService: CardExtractionService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async run(): Promise<BatchSummary> {
    this.logger.log('[BATCH] Starting medical card extraction');

    const imagePaths = await this.imageSource.listImages();
    const total = imagePaths.length;
    if (total === 0) {
      this.logger.warn('[BATCH] No images found');
      return { total, processed: 0, failed: 0, outputPath: null };
    }

    if (!this.visionModel.isConfigured()) {
      this.logger.error(
        `[BATCH] Vision model API key is not configured; skipping ${total} image(s)`,
      );
      return { total, processed: 0, failed: total, outputPath: null };
    }

    const delayMs = this.configService.getOrThrow(
      'cardExtraction.requestDelayMs',
      { infer: true },
    );

    const cards: ProcessedCard[] = [];
    for (const [index, imagePath] of imagePaths.entries()) {
      if (index > 0 && delayMs > 0) {
        await sleep(delayMs);
      }
      this.logger.log(
        `[BATCH] Processing image ${index + 1}/${total}: ${path.basename(imagePath)}`,
      );

      const card = await this.processPath(imagePath);
      if (card) {
        cards.push(card);
      }
    }

    const failed = total - cards.length;
    if (cards.length === 0) {
      this.logger.warn('[BATCH] No data extracted from any images');
      return { total, processed: 0, failed, outputPath: null };
    }

    const outputPath = await this.spreadsheet.appendRecords(cards);
    this.logger.log(
      `[BATCH] Completed | Processed: ${cards.length} | Failed: ${failed} | Output: ${outputPath}`,
    );
    return { total, processed: cards.length, failed, outputPath };
  }

  private async processPath(imagePath: string): Promise<ProcessedCard | null> {
    try {
      const image = await this.imageSource.readImage(imagePath);
      return await this.cardExtractionService.processImage(image);
    } catch (error) {
      this.logger.error(
        `[BATCH] Failed to process ${path.basename(imagePath)}: ${describeError(error)}`,
      );
      return null;
    }
  }
}
