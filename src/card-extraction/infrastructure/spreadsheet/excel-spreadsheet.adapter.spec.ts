import * as ExcelJS from 'exceljs';
import fs from 'node:fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Sex } from '../../domain/enums/sex.enum';
import { ProcessedCard } from '../../domain/entities/extraction-record.entity';
import { createConfigService } from '../../testing/config.mock';
import { ExcelSpreadsheetAdapter } from './excel-spreadsheet.adapter';
import { SPREADSHEET_COLUMNS } from './spreadsheet-columns';

const HEADERS = [
  'Patient Name',
  'Age',
  'Sex',
  'Telephone',
  'Address',
  'Kebele',
  'Date',
  'Image Filename',
];

const FIRST_CARD: ProcessedCard = {
  patientName: 'Abebe Bekele',
  age: '34',
  sex: Sex.MALE,
  telephone: '0912345678',
  address: null,
  kebele: '05',
  date: '15/08/2015',
  imageFilename: 'card-001.jpg',
};

const SECOND_CARD: ProcessedCard = {
  patientName: 'Almaz Tesfaye',
  age: '27',
  sex: Sex.FEMALE,
  telephone: null,
  address: 'Bahir Dar',
  kebele: '',
  date: null,
  imageFilename: 'card-002.png',
};

async function readSheet(filePath: string): Promise<ExcelJS.Worksheet> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);
  return workbook.worksheets[0];
}

function rowValues(sheet: ExcelJS.Worksheet, rowNumber: number): ExcelJS.CellValue[] {
  const row = sheet.getRow(rowNumber);
  return SPREADSHEET_COLUMNS.map((_, index) => row.getCell(index + 1).value);
}

describe('ExcelSpreadsheetAdapter', () => {
  let workDir: string;
  let outputPath: string;
  let templatePath: string;
  let adapter: ExcelSpreadsheetAdapter;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'card-excel-'));
    outputPath = path.join(workDir, 'output', 'cards.xlsx');
    templatePath = path.join(workDir, 'template.xlsx');
    adapter = new ExcelSpreadsheetAdapter(
      createConfigService({ excelOutput: outputPath, excelTemplate: templatePath }),
    );
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('should create a new workbook with a header row', async () => {
    await expect(adapter.appendRecords([FIRST_CARD])).resolves.toBe(outputPath);

    const sheet = await readSheet(outputPath);
    expect(sheet.name).toBe('Medical Cards');
    expect(rowValues(sheet, 1)).toEqual(HEADERS);
    expect(rowValues(sheet, 2)).toEqual([
      'Abebe Bekele',
      '34',
      'M',
      '0912345678',
      null,
      '05',
      '15/08/2015',
      'card-001.jpg',
    ]);
  });

  it('should append below existing rows', async () => {
    await adapter.appendRecords([FIRST_CARD]);
    await adapter.appendRecords([SECOND_CARD]);

    const sheet = await readSheet(outputPath);
    expect(sheet.rowCount).toBe(3);
    expect(rowValues(sheet, 2)[0]).toBe('Abebe Bekele');
    expect(rowValues(sheet, 3)[0]).toBe('Almaz Tesfaye');
    expect(rowValues(sheet, 3)[4]).toBe('Bahir Dar');
  });

  it('should start from the template when there is no output yet', async () => {
    await adapter.writeTemplate(templatePath);

    await adapter.appendRecords([SECOND_CARD]);

    const sheet = await readSheet(outputPath);
    expect(rowValues(sheet, 1)).toEqual(HEADERS);
    expect(rowValues(sheet, 2)[7]).toBe('card-002.png');
  });

  it('should write a styled template', async () => {
    await expect(adapter.writeTemplate(templatePath)).resolves.toBe(templatePath);

    const sheet = await readSheet(templatePath);
    const header = sheet.getRow(1).getCell(1);
    expect(rowValues(sheet, 1)).toEqual(HEADERS);
    expect(header.font.bold).toBe(true);
    expect(header.font.size).toBe(12);
    expect(header.alignment.horizontal).toBe('center');
    expect(sheet.getColumn(1).width).toBe(30);
    expect(sheet.rowCount).toBe(1);
  });

  it('should report whether the output exists', async () => {
    await expect(adapter.outputExists()).resolves.toBe(false);

    await adapter.appendRecords([FIRST_CARD]);

    await expect(adapter.outputExists()).resolves.toBe(true);
    expect(adapter.getOutputPath()).toBe(outputPath);
  });
});
