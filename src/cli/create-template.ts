import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { SpreadsheetPort } from '../card-extraction/domain/ports/spreadsheet.port';
import { AllConfigType } from '../config/config.type';
import { describeError } from '../utils/phi-sanitizer.util';

/**
 * Writes the styled, empty template workbook to the path given as the first
 * argument, or to CARD_EXTRACTION_EXCEL_TEMPLATE.
 */
async function main(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  try {
    const configService = app.get(ConfigService<AllConfigType>);
    const spreadsheet = app.get<SpreadsheetPort>('SpreadsheetPort');
    const target =
      process.argv[2] ??
      configService.getOrThrow('cardExtraction.excelTemplate', { infer: true });

    const written = await spreadsheet.writeTemplate(target);
    Logger.log(`Excel template created: ${written}`, 'CreateTemplate');
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  Logger.error(`Template creation failed: ${describeError(error)}`, 'CreateTemplate');
  process.exitCode = 1;
});
