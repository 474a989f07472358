import {
  ALL_RECORD_FIELDS,
  RecordField,
} from '../enums/record-field.enum';
import { isSex } from '../enums/sex.enum';
import {
  ExtractionRecord,
  ValidationResult,
} from '../entities/extraction-record.entity';
import { ExtractionDiagnostics } from './extraction-diagnostics';
import {
  countNameTokens,
  hasTypicalTelephonePrefix,
  isValidKebele,
  isValidRecordDate,
  isValidTelephone,
  MAX_AGE_EXCLUSIVE,
  MIN_AGE_EXCLUSIVE,
} from './field-validators';

export interface RecordValidatorOptions {
  fields?: readonly RecordField[];
}

/**
 * Record Validator
 *
 * Checks run in a fixed order (name, age, sex, telephone, kebele, date) so
 * the message list is identical for identical records. Name, age and sex are
 * required when active; telephone, kebele and date are checked only when
 * present. The record is never modified.
 */
export class RecordValidator {
  private readonly fields: ReadonlySet<RecordField>;

  constructor(
    private readonly diagnostics: ExtractionDiagnostics,
    options: RecordValidatorOptions = {},
  ) {
    this.fields = new Set(options.fields ?? ALL_RECORD_FIELDS);
  }

  validate(record: ExtractionRecord): ValidationResult {
    const messages: string[] = [];

    if (this.fields.has(RecordField.PATIENT_NAME)) {
      this.checkPatientName(record, messages);
    }
    if (this.fields.has(RecordField.AGE)) {
      this.checkAge(record, messages);
    }
    if (this.fields.has(RecordField.SEX)) {
      this.checkSex(record, messages);
    }
    this.checkTelephone(record, messages);
    this.checkKebele(record, messages);
    this.checkDate(record, messages);

    const result: ValidationResult = {
      isValid: messages.length === 0,
      messages,
    };
    this.diagnostics.validationCompleted(result);
    return result;
  }

  private checkPatientName(record: ExtractionRecord, messages: string[]): void {
    if (!record.patientName) {
      messages.push('Patient name not found in the extracted data');
    } else if (countNameTokens(record.patientName) < 2) {
      messages.push('Patient name does not contain both first and last name');
    }
  }

  private checkAge(record: ExtractionRecord, messages: string[]): void {
    if (!record.age) {
      messages.push('Age not found in the extracted data');
      return;
    }
    if (!/^\d+$/.test(record.age)) {
      messages.push('Age value is not a valid number');
      return;
    }
    const age = parseInt(record.age, 10);
    if (age <= MIN_AGE_EXCLUSIVE || age >= MAX_AGE_EXCLUSIVE) {
      messages.push(
        `Age value ${age} is outside reasonable range (${MIN_AGE_EXCLUSIVE + 1}-${MAX_AGE_EXCLUSIVE - 1})`,
      );
    }
  }

  private checkSex(record: ExtractionRecord, messages: string[]): void {
    if (!record.sex) {
      messages.push('Sex not found in the extracted data');
    } else if (!isSex(record.sex)) {
      messages.push("Sex value must be 'M' or 'F'");
    }
  }

  private checkTelephone(record: ExtractionRecord, messages: string[]): void {
    if (!record.telephone) {
      return;
    }
    if (!isValidTelephone(record.telephone)) {
      messages.push('Telephone number is not exactly 10 digits');
    } else if (!hasTypicalTelephonePrefix(record.telephone)) {
      this.diagnostics.validationWarning(
        "Telephone number does not start with '09'",
      );
    }
  }

  private checkKebele(record: ExtractionRecord, messages: string[]): void {
    if (record.kebele && !isValidKebele(record.kebele)) {
      messages.push('Kebele is not valid (must be 01-17)');
    }
  }

  private checkDate(record: ExtractionRecord, messages: string[]): void {
    if (record.date && !isValidRecordDate(record.date)) {
      messages.push('Date is not a valid Ethiopian calendar date');
    }
  }
}
