import { RecordField } from '../../domain/enums/record-field.enum';
import { buildExtractionPrompt } from './extraction-prompt';

describe('buildExtractionPrompt', () => {
  it('should ask for one tag per active field in field order', () => {
    const prompt = buildExtractionPrompt([RecordField.AGE, RecordField.SEX]);

    expect(prompt.split('\n')).toEqual([
      'This is a medical card. Extract the following fields from the image.',
      'Answer with exactly these tags and nothing else:',
      "<age>the patient's age as a number</age>",
      '<sex>M or F</sex>',
      'Leave a tag empty if the field is not on the card.',
    ]);
  });

  it('should not mention inactive fields', () => {
    const prompt = buildExtractionPrompt([RecordField.AGE]);

    expect(prompt).not.toContain('<telephone>');
  });
});
