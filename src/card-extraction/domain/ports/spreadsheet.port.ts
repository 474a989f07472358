import { ProcessedCard } from '../entities/extraction-record.entity';

export interface SpreadsheetPort {
  /**
   * Append cards below the last used row of the output workbook
   * @returns path of the saved workbook
   */
  appendRecords(cards: readonly ProcessedCard[]): Promise<string>;

  /** Write an empty workbook with the styled header row */
  writeTemplate(filePath: string): Promise<string>;

  getOutputPath(): string;

  outputExists(): Promise<boolean>;
}
