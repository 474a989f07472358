import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { AllConfigType } from '../config/config.type';
import { CardBatchService } from './card-batch.service';
import { CardExtractionController } from './card-extraction.controller';
import { CardExtractionService } from './card-extraction.service';
import { CardParsingDomainService } from './domain/services/card-parsing.domain.service';
import { LocalImageSourceAdapter } from './infrastructure/images/local-image-source.adapter';
import { ExcelSpreadsheetAdapter } from './infrastructure/spreadsheet/excel-spreadsheet.adapter';
import { OpenRouterVisionAdapter } from './infrastructure/vision/openrouter-vision.adapter';

@Module({
  imports: [
    // File upload (kept in memory)
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => ({
        limits: {
          fileSize:
            configService.getOrThrow('cardExtraction.maxFileSizeMb', {
              infer: true,
            }) *
            1024 *
            1024,
          files: 1,
        },
      }),
    }),
  ],
  controllers: [CardExtractionController],
  providers: [
    // Application layer
    CardExtractionService,
    CardBatchService,

    // Domain layer
    CardParsingDomainService,

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: 'VisionModelPort',
      useClass: OpenRouterVisionAdapter,
    },
    {
      provide: 'ImageSourcePort',
      useClass: LocalImageSourceAdapter,
    },
    {
      provide: 'SpreadsheetPort',
      useClass: ExcelSpreadsheetAdapter,
    },
  ],
  exports: [
    CardExtractionService,
    CardBatchService,
    'VisionModelPort',
    'SpreadsheetPort',
  ],
})
export class CardExtractionModule {}
