import { RecordField } from '../enums/record-field.enum';
import { Sex } from '../enums/sex.enum';
import {
  emptyRecord,
  ExtractionRecord,
} from '../entities/extraction-record.entity';
import { createDiagnosticsMock } from '../../testing/diagnostics.mock';
import { RecordValidator } from './record-validator';

function record(overrides: Partial<ExtractionRecord>): ExtractionRecord {
  return { ...emptyRecord(), ...overrides };
}

const COMPLETE = record({
  patientName: 'Abebe Bekele',
  age: '34',
  sex: Sex.MALE,
  telephone: '0912345678',
  kebele: '05',
  date: '15/08/2015',
});

describe('RecordValidator', () => {
  let diagnostics: ReturnType<typeof createDiagnosticsMock>;
  let validator: RecordValidator;

  beforeEach(() => {
    diagnostics = createDiagnosticsMock();
    validator = new RecordValidator(diagnostics);
  });

  it('should accept a complete record', () => {
    expect(validator.validate(COMPLETE)).toEqual({ isValid: true, messages: [] });
  });

  it('should report the required fields of an empty record', () => {
    expect(validator.validate(emptyRecord())).toEqual({
      isValid: false,
      messages: [
        'Patient name not found in the extracted data',
        'Age not found in the extracted data',
        'Sex not found in the extracted data',
      ],
    });
  });

  it('should report a single-token name', () => {
    const result = validator.validate({ ...COMPLETE, patientName: 'Abebe' });
    expect(result.messages).toEqual([
      'Patient name does not contain both first and last name',
    ]);
  });

  it('should report a compound age as not a number', () => {
    const result = validator.validate({ ...COMPLETE, age: '2 years' });
    expect(result.messages).toEqual(['Age value is not a valid number']);
  });

  it.each(['0', '120', '150'])('should report age %s as out of range', (age) => {
    const result = validator.validate({ ...COMPLETE, age });
    expect(result.messages).toEqual([
      `Age value ${age} is outside reasonable range (1-119)`,
    ]);
  });

  it('should report a malformed telephone number', () => {
    const result = validator.validate({ ...COMPLETE, telephone: '12345' });
    expect(result.messages).toEqual(['Telephone number is not exactly 10 digits']);
  });

  it('should only warn about an unusual telephone prefix', () => {
    const result = validator.validate({ ...COMPLETE, telephone: '0712345678' });

    expect(result.isValid).toBe(true);
    expect(diagnostics.validationWarning).toHaveBeenCalledWith(
      "Telephone number does not start with '09'",
    );
  });

  it('should report a kebele outside 01-17', () => {
    const result = validator.validate({ ...COMPLETE, kebele: '18' });
    expect(result.messages).toEqual(['Kebele is not valid (must be 01-17)']);
  });

  it('should accept an empty kebele', () => {
    expect(validator.validate({ ...COMPLETE, kebele: '' }).isValid).toBe(true);
  });

  it('should accept a bare day of month as a date', () => {
    expect(validator.validate({ ...COMPLETE, date: '15' }).isValid).toBe(true);
  });

  it('should report an invalid Ethiopian date', () => {
    const result = validator.validate({ ...COMPLETE, date: '31/01/2016' });
    expect(result.messages).toEqual([
      'Date is not a valid Ethiopian calendar date',
    ]);
  });

  it('should list messages in a fixed order', () => {
    const result = validator.validate(
      record({
        patientName: 'Abebe',
        age: '200',
        telephone: '123',
        kebele: '30',
        date: '40/40/2016',
      }),
    );

    expect(result.messages).toEqual([
      'Patient name does not contain both first and last name',
      'Age value 200 is outside reasonable range (1-119)',
      'Sex not found in the extracted data',
      'Telephone number is not exactly 10 digits',
      'Kebele is not valid (must be 01-17)',
      'Date is not a valid Ethiopian calendar date',
    ]);
  });

  it('should give the same result for the same record', () => {
    const input = record({ age: '42' });
    expect(validator.validate(input)).toEqual(validator.validate(input));
  });

  it('should not require inactive fields', () => {
    const ageOnly = new RecordValidator(diagnostics, {
      fields: [RecordField.AGE],
    });

    expect(ageOnly.validate(record({ age: '30' }))).toEqual({
      isValid: true,
      messages: [],
    });
  });

  it('should report the result to diagnostics', () => {
    const result = validator.validate(COMPLETE);
    expect(diagnostics.validationCompleted).toHaveBeenCalledWith(result);
  });
});
