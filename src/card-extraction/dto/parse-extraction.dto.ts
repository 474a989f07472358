import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ParseExtractionDto {
  @ApiProperty({
    description: 'Vision model reply text, tagged or free-form',
    example: '<patient_name>Abebe Bekele</patient_name><age>34</age><sex>M</sex>',
    maxLength: 10000,
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(10000)
  text!: string;
}
