import { FIELD_TAGS, RecordField } from '../../domain/enums/record-field.enum';

export const SYSTEM_PROMPT =
  'You are an AI assistant specialized in extracting specific information from images. Be concise and direct.';

const FIELD_INSTRUCTIONS: Record<RecordField, string> = {
  [RecordField.PATIENT_NAME]: "the patient's first and last name",
  [RecordField.AGE]: "the patient's age as a number",
  [RecordField.SEX]: 'M or F',
  [RecordField.TELEPHONE]: 'the 10-digit telephone number',
  [RecordField.ADDRESS]: 'the town or address',
  [RecordField.KEBELE]: 'the two-digit kebele number',
  [RecordField.DATE]: 'the card date as DD/MM/YYYY (Ethiopian calendar)',
};

/**
 * User prompt asking for one tag pair per active field, in field order.
 */
export function buildExtractionPrompt(fields: readonly RecordField[]): string {
  const lines = fields.map((field) => {
    const tag = FIELD_TAGS[field];
    return `<${tag}>${FIELD_INSTRUCTIONS[field]}</${tag}>`;
  });

  return [
    'This is a medical card. Extract the following fields from the image.',
    'Answer with exactly these tags and nothing else:',
    ...lines,
    'Leave a tag empty if the field is not on the card.',
  ].join('\n');
}
