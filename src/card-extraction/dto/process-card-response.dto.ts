import { ApiProperty } from '@nestjs/swagger';
import { ParseExtractionResponseDto } from './parse-extraction-response.dto';

export class ProcessCardResponseDto extends ParseExtractionResponseDto {
  @ApiProperty({ description: 'Raw vision model reply' })
  extractedText!: string;

  @ApiProperty({ example: '/api/v1/cards/download' })
  excelUrl!: string;
}
