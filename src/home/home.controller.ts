import { Controller, Get, Version } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';

import { HomeService } from './home.service';
import { HealthService } from './health.service';

@ApiTags('Home')
@Controller()
export class HomeController {
  constructor(
    private service: HomeService,
    private healthService: HealthService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Get Application Information',
    description: 'Name, version and description of the service.',
  })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: {
        name: { type: 'string', example: 'Medical Card Extractor' },
        version: { type: 'string', example: '1.0.0' },
        description: { type: 'string' },
      },
    },
  })
  appInfo() {
    return this.service.appInfo();
  }

  @Get('health')
  @Version('1')
  @ApiOperation({
    summary: 'Health Check',
    description:
      'Whether a vision model API key is configured and where the workbook is written.',
  })
  @ApiOkResponse({
    description: 'Health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        visionConfigured: { type: 'boolean', example: true },
        outputPath: {
          type: 'string',
          example: 'output/medical_cards_export.xlsx',
        },
        outputExists: { type: 'boolean', example: false },
      },
    },
  })
  async health() {
    return this.healthService.check();
  }
}
