import {
  ALL_RECORD_FIELDS,
  parseFieldSet,
  RecordField,
} from './record-field.enum';

describe('parseFieldSet', () => {
  it('should activate every field when nothing is configured', () => {
    expect(parseFieldSet(undefined)).toEqual(ALL_RECORD_FIELDS);
    expect(parseFieldSet('  ')).toEqual(ALL_RECORD_FIELDS);
  });

  it('should keep the canonical field order regardless of input order', () => {
    expect(parseFieldSet('sex, age')).toEqual([RecordField.AGE, RecordField.SEX]);
  });

  it('should ignore empty entries', () => {
    expect(parseFieldSet('age,,')).toEqual([RecordField.AGE]);
  });

  it('should reject unknown field names', () => {
    expect(() => parseFieldSet('age,cardNumber')).toThrow(
      'Unknown record field(s): cardNumber',
    );
  });
});
