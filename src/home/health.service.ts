import { Inject, Injectable } from '@nestjs/common';
import { SpreadsheetPort } from '../card-extraction/domain/ports/spreadsheet.port';
import { VisionModelPort } from '../card-extraction/domain/ports/vision-model.port';

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  visionConfigured: boolean;
  outputPath: string;
  outputExists: boolean;
}

/**
 * Health Check Service
 *
 * Reports whether the vision model can be called and where the workbook is
 * written. Degraded means uploads and batch runs will fail until an API key
 * is configured.
 */
@Injectable()
export class HealthService {
  constructor(
    @Inject('VisionModelPort')
    private readonly visionModel: VisionModelPort,
    @Inject('SpreadsheetPort')
    private readonly spreadsheet: SpreadsheetPort,
  ) {}

  async check(): Promise<HealthStatus> {
    const visionConfigured = this.visionModel.isConfigured();
    return {
      status: visionConfigured ? 'healthy' : 'degraded',
      visionConfigured,
      outputPath: this.spreadsheet.getOutputPath(),
      outputExists: await this.spreadsheet.outputExists(),
    };
  }
}
