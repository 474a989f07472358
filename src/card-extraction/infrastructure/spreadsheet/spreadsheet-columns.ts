import { ProcessedCard } from '../../domain/entities/extraction-record.entity';

export interface SpreadsheetColumn {
  header: string;
  key: keyof ProcessedCard;
  width: number;
}

export const SPREADSHEET_COLUMNS: readonly SpreadsheetColumn[] = [
  { header: 'Patient Name', key: 'patientName', width: 30 },
  { header: 'Age', key: 'age', width: 15 },
  { header: 'Sex', key: 'sex', width: 10 },
  { header: 'Telephone', key: 'telephone', width: 15 },
  { header: 'Address', key: 'address', width: 20 },
  { header: 'Kebele', key: 'kebele', width: 10 },
  { header: 'Date', key: 'date', width: 15 },
  { header: 'Image Filename', key: 'imageFilename', width: 30 },
];

export const SHEET_NAME = 'Medical Cards';

export const HEADER_FILL_ARGB = 'FFDDEBF7';
