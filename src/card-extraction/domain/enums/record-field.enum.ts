/**
 * Record Field Enum
 *
 * One entry per field the vision model is asked for. The value is the
 * property name on ExtractionRecord; the markup tag lives in FIELD_TAGS.
 */
export enum RecordField {
  PATIENT_NAME = 'patientName',
  AGE = 'age',
  SEX = 'sex',
  TELEPHONE = 'telephone',
  ADDRESS = 'address',
  KEBELE = 'kebele',
  DATE = 'date',
}

export const FIELD_TAGS: Record<RecordField, string> = {
  [RecordField.PATIENT_NAME]: 'patient_name',
  [RecordField.AGE]: 'age',
  [RecordField.SEX]: 'sex',
  [RecordField.TELEPHONE]: 'telephone',
  [RecordField.ADDRESS]: 'address',
  [RecordField.KEBELE]: 'kebele',
  [RecordField.DATE]: 'date',
};

// Parse order; also the order of prompt lines and spreadsheet columns
export const ALL_RECORD_FIELDS: readonly RecordField[] = [
  RecordField.PATIENT_NAME,
  RecordField.AGE,
  RecordField.SEX,
  RecordField.TELEPHONE,
  RecordField.ADDRESS,
  RecordField.KEBELE,
  RecordField.DATE,
];

export function isRecordField(value: string): value is RecordField {
  return ALL_RECORD_FIELDS.some((field) => field === value);
}

/**
 * Parse a comma separated field list (e.g. "patientName,age,sex").
 * Empty or missing input activates every field.
 *
 * @throws Error on an unknown field name
 */
export function parseFieldSet(raw?: string): RecordField[] {
  if (!raw || raw.trim().length === 0) {
    return [...ALL_RECORD_FIELDS];
  }

  const requested = raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  const unknown = requested.filter((name) => !isRecordField(name));
  if (unknown.length > 0) {
    throw new Error(`Unknown record field(s): ${unknown.join(', ')}`);
  }

  return ALL_RECORD_FIELDS.filter((field) => requested.includes(field));
}
