import { ApiProperty } from '@nestjs/swagger';
import { Sex } from '../domain/enums/sex.enum';
import { ExtractionRecord } from '../domain/entities/extraction-record.entity';

export class ExtractionRecordResponseDto {
  @ApiProperty({ type: String, nullable: true, example: 'Abebe Bekele' })
  patientName!: string | null;

  @ApiProperty({ type: String, nullable: true, example: '34' })
  age!: string | null;

  @ApiProperty({ enum: Sex, nullable: true })
  sex!: Sex | null;

  @ApiProperty({ type: String, nullable: true, example: '0912345678' })
  telephone!: string | null;

  @ApiProperty({ type: String, nullable: true, example: 'Bahir Dar' })
  address!: string | null;

  @ApiProperty({
    type: String,
    nullable: true,
    description: 'Two digits 01-17; empty when the card shows an empty box',
    example: '05',
  })
  kebele!: string | null;

  @ApiProperty({
    type: String,
    nullable: true,
    description: 'DD/MM/YYYY, Ethiopian calendar',
    example: '15/08/2015',
  })
  date!: string | null;

  static fromRecord(record: ExtractionRecord): ExtractionRecordResponseDto {
    const dto = new ExtractionRecordResponseDto();
    dto.patientName = record.patientName;
    dto.age = record.age;
    dto.sex = record.sex;
    dto.telephone = record.telephone;
    dto.address = record.address;
    dto.kebele = record.kebele;
    dto.date = record.date;
    return dto;
  }
}
