import { RecordField } from '../enums/record-field.enum';
import { isSex } from '../enums/sex.enum';
import {
  DateDefaults,
  normalizeAddress,
  normalizeAge,
  normalizeDate,
  normalizeKebele,
  normalizeWhitespace,
} from './field-normalizers';
import {
  isValidAge,
  isValidEthiopianDate,
  isValidKebele,
  isValidPatientName,
  isValidTelephone,
} from './field-validators';

export interface FieldRule {
  normalize(value: string): string | null;
  isValid(value: string): boolean;
  // Empty tag content is a value in its own right (kebele only)
  allowEmpty: boolean;
}

export function buildFieldRules(
  dateDefaults: DateDefaults,
): Record<RecordField, FieldRule> {
  return {
    [RecordField.PATIENT_NAME]: {
      normalize: normalizeWhitespace,
      isValid: isValidPatientName,
      allowEmpty: false,
    },
    [RecordField.AGE]: {
      normalize: normalizeAge,
      isValid: isValidAge,
      allowEmpty: false,
    },
    [RecordField.SEX]: {
      normalize: (value) => value.trim(),
      isValid: isSex,
      allowEmpty: false,
    },
    [RecordField.TELEPHONE]: {
      normalize: (value) => value.trim(),
      isValid: isValidTelephone,
      allowEmpty: false,
    },
    [RecordField.ADDRESS]: {
      normalize: normalizeAddress,
      isValid: (value) => value.length > 0,
      allowEmpty: false,
    },
    [RecordField.KEBELE]: {
      normalize: normalizeKebele,
      isValid: (value) => value === '' || isValidKebele(value),
      allowEmpty: true,
    },
    [RecordField.DATE]: {
      normalize: (value) => normalizeDate(value, dateDefaults),
      isValid: isValidEthiopianDate,
      allowEmpty: false,
    },
  };
}
