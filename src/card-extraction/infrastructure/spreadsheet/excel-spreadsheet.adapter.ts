import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as ExcelJS from 'exceljs';
import fs from 'node:fs/promises';
import * as path from 'path';
import { AllConfigType } from '../../../config/config.type';
import { fileExists } from '../../../utils/file-exists';
import { ProcessedCard } from '../../domain/entities/extraction-record.entity';
import { SpreadsheetPort } from '../../domain/ports/spreadsheet.port';
import {
  HEADER_FILL_ARGB,
  SHEET_NAME,
  SPREADSHEET_COLUMNS,
} from './spreadsheet-columns';

const HEADER_ROW = 1;

/**
 * Excel Spreadsheet Adapter
 *
 * Appends cards to the output workbook. The workbook is opened from, in
 * order: the existing output file, the configured template, or a new
 * workbook with the styled header row.
 */
@Injectable()
export class ExcelSpreadsheetAdapter implements SpreadsheetPort {
  private readonly logger = new Logger(ExcelSpreadsheetAdapter.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  getOutputPath(): string {
    return this.configService.getOrThrow('cardExtraction.excelOutput', {
      infer: true,
    });
  }

  outputExists(): Promise<boolean> {
    return fileExists(this.getOutputPath());
  }

  async appendRecords(cards: readonly ProcessedCard[]): Promise<string> {
    const outputPath = this.getOutputPath();
    const workbook = await this.openWorkbook(outputPath);
    const sheet = workbook.worksheets[0] ?? this.addSheet(workbook);

    if (!sheet.getRow(HEADER_ROW).hasValues) {
      this.writeHeader(sheet);
    }

    let rowNumber = this.nextEmptyRow(sheet);
    for (const card of cards) {
      const row = sheet.getRow(rowNumber);
      SPREADSHEET_COLUMNS.forEach((column, index) => {
        row.getCell(index + 1).value = card[column.key];
      });
      rowNumber += 1;
    }

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await workbook.xlsx.writeFile(outputPath);

    this.logger.log(
      `[EXCEL] Saved ${cards.length} row(s) to ${outputPath}`,
    );
    return outputPath;
  }

  async writeTemplate(filePath: string): Promise<string> {
    const workbook = new ExcelJS.Workbook();
    this.addSheet(workbook);

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await workbook.xlsx.writeFile(filePath);

    this.logger.log(`[EXCEL] Template written to ${filePath}`);
    return filePath;
  }

  private async openWorkbook(outputPath: string): Promise<ExcelJS.Workbook> {
    const workbook = new ExcelJS.Workbook();

    if (await fileExists(outputPath)) {
      this.logger.debug(`[EXCEL] Appending to ${outputPath}`);
      await workbook.xlsx.readFile(outputPath);
      return workbook;
    }

    const templatePath = this.configService.getOrThrow(
      'cardExtraction.excelTemplate',
      { infer: true },
    );
    if (await fileExists(templatePath)) {
      this.logger.log(`[EXCEL] Using template ${templatePath}`);
      await workbook.xlsx.readFile(templatePath);
      return workbook;
    }

    this.logger.warn(
      `[EXCEL] No template found at ${templatePath}, creating a new workbook`,
    );
    this.addSheet(workbook);
    return workbook;
  }

  private addSheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet {
    const sheet = workbook.addWorksheet(SHEET_NAME);
    this.writeHeader(sheet);
    return sheet;
  }

  private writeHeader(sheet: ExcelJS.Worksheet): void {
    const header = sheet.getRow(HEADER_ROW);
    SPREADSHEET_COLUMNS.forEach((column, index) => {
      const cell = header.getCell(index + 1);
      cell.value = column.header;
      cell.font = { bold: true, size: 12 };
      cell.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: HEADER_FILL_ARGB },
      };
      cell.alignment = { horizontal: 'center', vertical: 'middle' };
      sheet.getColumn(index + 1).width = column.width;
    });
  }

  // Templates may carry formatted but empty rows; only rows with values count
  private nextEmptyRow(sheet: ExcelJS.Worksheet): number {
    for (let rowNumber = sheet.rowCount; rowNumber > HEADER_ROW; rowNumber -= 1) {
      if (sheet.getRow(rowNumber).hasValues) {
        return rowNumber + 1;
      }
    }
    return HEADER_ROW + 1;
  }
}
