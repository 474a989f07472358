import { Sex } from '../enums/sex.enum';

/**
 * Structured fields read from one medical card.
 *
 * Every field is independently nullable; null means the value was not found
 * (or was found and rejected). Kebele may also be "" when the card shows an
 * empty kebele box.
 */
export interface ExtractionRecord {
  readonly patientName: string | null;
  readonly age: string | null;
  readonly sex: Sex | null;
  readonly telephone: string | null;
  readonly address: string | null;
  readonly kebele: string | null;
  readonly date: string | null;
}

export type ProcessedCard = ExtractionRecord & {
  readonly imageFilename: string;
};

export interface ValidationResult {
  isValid: boolean;
  messages: string[];
}

export function emptyRecord(): ExtractionRecord {
  return {
    patientName: null,
    age: null,
    sex: null,
    telephone: null,
    address: null,
    kebele: null,
    date: null,
  };
}

export function isEmptyRecord(record: ExtractionRecord): boolean {
  return (
    record.patientName === null &&
    record.age === null &&
    record.sex === null &&
    record.telephone === null &&
    record.address === null &&
    record.kebele === null &&
    record.date === null
  );
}
