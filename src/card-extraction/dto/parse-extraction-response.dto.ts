import { ApiProperty } from '@nestjs/swagger';
import { ExtractionRecordResponseDto } from './extraction-record-response.dto';

export class ParseExtractionResponseDto {
  @ApiProperty({ type: ExtractionRecordResponseDto })
  record!: ExtractionRecordResponseDto;

  @ApiProperty()
  isValid!: boolean;

  @ApiProperty({ type: [String] })
  messages!: string[];
}
