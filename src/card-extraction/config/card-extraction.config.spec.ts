import cardExtractionConfig from './card-extraction.config';
import { RecordField } from '../domain/enums/record-field.enum';

describe('cardExtractionConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { NODE_ENV: 'test' };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should apply defaults when nothing is set', async () => {
    const config = await cardExtractionConfig();

    expect(config.openRouter).toEqual({
      apiKey: null,
      apiUrl: 'https://openrouter.ai/api/v1/chat/completions',
      model: 'google/gemini-2.0-flash-001',
      maxTokens: 300,
      temperature: 0.1,
      rateLimitMaxRetries: 3,
    });
    expect(config.dateDefaults).toEqual({ month: 1, year: 2017 });
    expect(config.fields).toHaveLength(7);
    expect(config.excelOutput).toBe('output/medical_cards_export.xlsx');
    expect(config.requestDelayMs).toBe(1000);
  });

  it('should read overrides from the environment', async () => {
    process.env.OPENROUTER_API_KEY = 'test-secret';
    process.env.CARD_EXTRACTION_FIELDS = 'age,sex';
    process.env.CARD_EXTRACTION_DEFAULT_DATE_MONTH = '13';
    process.env.CARD_EXTRACTION_TEMPERATURE = '0.5';

    const config = await cardExtractionConfig();

    expect(config.openRouter.apiKey).toBe('test-secret');
    expect(config.openRouter.temperature).toBe(0.5);
    expect(config.fields).toEqual([RecordField.AGE, RecordField.SEX]);
    expect(config.dateDefaults.month).toBe(13);
  });

  it('should reject an out-of-range default month', () => {
    process.env.CARD_EXTRACTION_DEFAULT_DATE_MONTH = '14';

    expect(() => cardExtractionConfig()).toThrow();
  });

  it('should reject unknown field names', () => {
    process.env.CARD_EXTRACTION_FIELDS = 'age,bloodType';

    expect(() => cardExtractionConfig()).toThrow(
      'Unknown record field(s): bloodType',
    );
  });
});
