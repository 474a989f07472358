import { RecordField } from '../enums/record-field.enum';
import { Sex } from '../enums/sex.enum';
import { CANONICAL_BAHIR_DAR, isBahirDarAlias } from './field-normalizers';
import { MAX_AGE_EXCLUSIVE, MIN_AGE_EXCLUSIVE } from './field-validators';

/**
 * Fallback Field Extractors
 *
 * Used only when the model reply carries no field markup at all. Each field
 * has an ordered list of strategies tuned to loose natural-language phrasing;
 * the record parser takes the first candidate that survives the field's
 * normalizer and validator.
 *
 * Strategies are pure and never log the text they inspect.
 */

export interface ExtractorStrategy {
  readonly name: string;
  extract(text: string): string | null;
}

export interface StrategyMatch {
  strategy: string;
  value: string;
}

function pattern(
  name: string,
  regex: RegExp,
  build: (match: RegExpExecArray) => string | null = (match) => match[1],
): ExtractorStrategy {
  return {
    name,
    extract(text: string): string | null {
      const match = regex.exec(text);
      return match ? build(match) : null;
    },
  };
}

/**
 * Apply strategies in order. A candidate rejected by `accept` does not stop
 * the scan; the next strategy is tried.
 */
export function runStrategies(
  strategies: readonly ExtractorStrategy[],
  text: string,
  accept: (candidate: string) => string | null,
): StrategyMatch | null {
  for (const strategy of strategies) {
    const candidate = strategy.extract(text);
    if (candidate === null) {
      continue;
    }
    const value = accept(candidate);
    if (value !== null) {
      return { strategy: strategy.name, value };
    }
  }
  return null;
}

// Words that show up next to labels but are never part of a name
const NAME_STOPWORDS = new Set([
  'age',
  'aged',
  'and',
  'address',
  'date',
  'female',
  'gender',
  'is',
  'kebele',
  'male',
  'name',
  'named',
  'old',
  'patient',
  'phone',
  'sex',
  'telephone',
  'the',
  'year',
  'years',
]);

function twoWordName(first: string, last: string): string | null {
  const tokens = [first, last];
  if (tokens.some((token) => NAME_STOPWORDS.has(token.toLowerCase()))) {
    return null;
  }
  return tokens.join(' ');
}

function toSex(token: string): Sex | null {
  switch (token.toUpperCase()) {
    case 'M':
    case 'MALE':
      return Sex.MALE;
    case 'F':
    case 'FEMALE':
      return Sex.FEMALE;
    default:
      return null;
  }
}

function contains(name: string, glyph: string, value: string): ExtractorStrategy {
  return {
    name,
    extract: (text) => (text.includes(glyph) ? value : null),
  };
}

const YEARS = '(?:years|year|yrs|yr)';

export const FALLBACK_STRATEGIES: Record<RecordField, readonly ExtractorStrategy[]> = {
  [RecordField.PATIENT_NAME]: [
    pattern(
      'labelled-name',
      /\b(?:patient\s+name|full\s+name|name)\b\s*(?:is\s+)?[:=-]?\s*(\p{L}+)[ \t]+(\p{L}+)/iu,
      (m) => twoWordName(m[1], m[2]),
    ),
    pattern(
      'patient-named',
      /\b(?:patient|person)\s+(?:is|named|called)\s+(\p{L}+)[ \t]+(\p{L}+)/iu,
      (m) => twoWordName(m[1], m[2]),
    ),
    pattern('bare-two-words', /^\s*(\p{L}+)\s+(\p{L}+)\s*$/u, (m) =>
      twoWordName(m[1], m[2]),
    ),
  ],

  [RecordField.AGE]: [
    pattern('labelled-age', /\bage\s*[:=-]?\s*(\d+)/i),
    pattern('age-is', /\bage\s+is\s+(\d+)/i),
    pattern('years-old', new RegExp(`(\\d+)\\s*${YEARS}\\s*old`, 'i')),
    pattern('years', new RegExp(`(\\d+)\\s*${YEARS}\\b`, 'i')),
    pattern('aged', /\baged\s+(\d+)/i),
    pattern('yo', /(\d+)\s*(?:yo\b|y\.o\.)/i),
  ],

  [RecordField.SEX]: [
    contains('amharic-male', 'ወ', Sex.MALE),
    contains('amharic-female', 'ሴ', Sex.FEMALE),
    pattern('labelled-sex', /\b(?:sex|gender)\s*[:=-]?\s*(male|female|m|f)\b/i, (m) =>
      toSex(m[1]),
    ),
    pattern('patient-is', /\b(?:patient|person)\s+is\s+(?:a\s+)?(male|female)\b/i, (m) =>
      toSex(m[1]),
    ),
    pattern('sex-word', /\b(male|female)\b/i, (m) => toSex(m[1])),
    pattern('sex-letter', /(?:^|[^\p{L}\p{N}'’])([MF])(?![\p{L}\p{N}])/u, (m) =>
      toSex(m[1]),
    ),
  ],

  [RecordField.TELEPHONE]: [
    pattern('labelled-phone', /\b(?:telephone|phone|tel|mobile)\s*[:=-]?\s*(\d{10})(?!\d)/i),
    pattern('ten-digits', /(?<!\d)(\d{10})(?!\d)/),
    pattern('international', /(?:\+|\b)251[\s-]?(9\d{8})(?!\d)/, (m) => `0${m[1]}`),
    pattern('split-leading-zero', /(?<!\d)0[\s-]?(\d{9})(?!\d)/, (m) => `0${m[1]}`),
  ],

  [RecordField.ADDRESS]: [
    pattern(
      'labelled-address',
      /\b(?:address|city|town|residence)\s*(?:is\s+|[:=-]\s*)([^\n,;<]+)/i,
    ),
    {
      name: 'city-alias',
      extract: (text) => (isBahirDarAlias(text) ? CANONICAL_BAHIR_DAR : null),
    },
  ],

  [RecordField.KEBELE]: [
    pattern('labelled-kebele', /\bkebele\s*[:=-]?\s*(\d+)/i),
    pattern('labelled-area', /\b(?:district|area|zone)\s*[:=-]?\s*(\d+)/i),
    pattern('kebele-nearby', /\bkebele\b\D*(\d+)/i),
    pattern('amharic-or-bdr', /(?:ቀ|\bbdr)\D*(\d+)/i),
  ],

  [RecordField.DATE]: [
    pattern(
      'labelled-date',
      /\bdate\s*[:=-]?\s*(\d{1,2}(?:\s*[/.-]\s*\d{1,2})?(?:\s*[/.-]\s*\d{4})?)(?!\d|\s*[/.-]\s*\d)/i,
    ),
    pattern('full-date', /(?<!\d)(\d{1,2}[/.-]\d{1,2}[/.-]\d{4})(?!\d)/),
  ],
};

/** First integer token anywhere in the text that could be an age. */
export const AGE_LAST_RESORT: ExtractorStrategy = {
  name: 'any-number-in-range',
  extract(text: string): string | null {
    for (const match of text.matchAll(/\d+/g)) {
      const value = parseInt(match[0], 10);
      if (value > MIN_AGE_EXCLUSIVE && value < MAX_AGE_EXCLUSIVE) {
        return String(value);
      }
    }
    return null;
  },
};
