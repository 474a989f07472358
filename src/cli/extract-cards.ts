import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { CardBatchService } from '../card-extraction/card-batch.service';
import { AllConfigType } from '../config/config.type';
import { describeError } from '../utils/phi-sanitizer.util';

/**
 * Batch entry point: reads every card image in CARD_EXTRACTION_IMAGE_DIR and
 * appends the results to CARD_EXTRACTION_EXCEL_OUTPUT.
 *
 * Exit code 1 when nothing could be extracted or the run failed.
 */
async function main(): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  const logger = new Logger('ExtractCards');

  try {
    const configService = app.get(ConfigService<AllConfigType>);
    app.useLogger(configService.getOrThrow('app.logLevels', { infer: true }));

    const summary = await app.get(CardBatchService).run();
    logger.log(
      `Total: ${summary.total} | Processed: ${summary.processed} | Failed: ${summary.failed}`,
    );

    if (summary.outputPath === null) {
      logger.warn('No data extracted from any images');
      return 1;
    }
    logger.log(`Medical card data extraction completed: ${summary.outputPath}`);
    return 0;
  } catch (error) {
    logger.error(`Batch run failed: ${describeError(error)}`);
    return 1;
  } finally {
    await app.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    Logger.error(`Startup failed: ${describeError(error)}`, 'ExtractCards');
    process.exitCode = 1;
  },
);
