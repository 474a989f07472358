import {
  ALL_RECORD_FIELDS,
  FIELD_TAGS,
  RecordField,
} from '../enums/record-field.enum';
import { isSex } from '../enums/sex.enum';
import {
  emptyRecord,
  ExtractionRecord,
} from '../entities/extraction-record.entity';
import { ExtractionDiagnostics } from './extraction-diagnostics';
import {
  AGE_LAST_RESORT,
  FALLBACK_STRATEGIES,
  runStrategies,
} from './field-extractors';
import { DateDefaults } from './field-normalizers';
import { buildFieldRules, FieldRule } from './field-rules';
import { extractTagged, hasFieldMarkup } from './tagged-extractor';

// Ethiopian calendar: Meskerem (month 1) of 2017 E.C.
export const DEFAULT_DATE_DEFAULTS: DateDefaults = { month: 1, year: 2017 };

export interface RecordParserOptions {
  fields?: readonly RecordField[];
  dateDefaults?: DateDefaults;
}

type FieldValues = Partial<Record<RecordField, string>>;

/**
 * Record Parser
 *
 * Turns a vision model reply into an ExtractionRecord:
 * 1. Tagged extraction per active field (<age>42</age>)
 * 2. Fallback strategies, only when the reply has no field markup at all
 * 3. Last-resort number scan for age, inside fallback mode
 *
 * Never throws. An internal fault yields an all-null record.
 */
export class RecordParser {
  private readonly fields: readonly RecordField[];
  private readonly rules: Record<RecordField, FieldRule>;

  constructor(
    private readonly diagnostics: ExtractionDiagnostics,
    options: RecordParserOptions = {},
  ) {
    this.fields = options.fields ?? ALL_RECORD_FIELDS;
    this.rules = buildFieldRules(
      options.dateDefaults ?? DEFAULT_DATE_DEFAULTS,
    );
  }

  parse(rawText: string): ExtractionRecord {
    try {
      return this.parseFields(rawText);
    } catch (error) {
      this.diagnostics.parseFailed(error);
      return emptyRecord();
    }
  }

  private parseFields(text: string): ExtractionRecord {
    const values: FieldValues = {};
    const useMarkup = hasFieldMarkup(text);

    for (const field of this.fields) {
      const value = useMarkup
        ? this.fromMarkup(text, field)
        : this.fromFallback(text, field);
      if (value !== null) {
        values[field] = value;
      }
    }

    return this.toRecord(values);
  }

  private fromMarkup(text: string, field: RecordField): string | null {
    const raw = extractTagged(text, FIELD_TAGS[field]);
    if (raw === null) {
      this.diagnostics.fieldResolved({
        field,
        outcome: 'missing',
        reason: 'no tag',
      });
      return null;
    }

    const rule = this.rules[field];
    if (raw.length === 0 && !rule.allowEmpty) {
      this.diagnostics.fieldResolved({
        field,
        outcome: 'missing',
        reason: 'empty tag',
      });
      return null;
    }

    const value = rule.normalize(raw);
    if (value === null || !rule.isValid(value)) {
      this.diagnostics.fieldResolved({
        field,
        outcome: 'rejected',
        reason: `tag content failed ${field} validation`,
      });
      return null;
    }

    this.diagnostics.fieldResolved({ field, outcome: 'tagged' });
    return value;
  }

  private fromFallback(text: string, field: RecordField): string | null {
    const accept = (candidate: string) => this.accept(field, candidate);

    const match = runStrategies(FALLBACK_STRATEGIES[field], text, accept);
    if (match) {
      this.diagnostics.fieldResolved({
        field,
        outcome: 'pattern',
        strategy: match.strategy,
      });
      return match.value;
    }

    if (field === RecordField.AGE) {
      const guess = runStrategies([AGE_LAST_RESORT], text, accept);
      if (guess) {
        this.diagnostics.fieldResolved({
          field,
          outcome: 'heuristic',
          strategy: guess.strategy,
        });
        return guess.value;
      }
    }

    this.diagnostics.fieldResolved({
      field,
      outcome: 'missing',
      reason: 'no pattern matched',
    });
    return null;
  }

  private accept(field: RecordField, candidate: string): string | null {
    const rule = this.rules[field];
    const value = rule.normalize(candidate);
    if (value === null || value.length === 0 || !rule.isValid(value)) {
      return null;
    }
    return value;
  }

  private toRecord(values: FieldValues): ExtractionRecord {
    const sex = values[RecordField.SEX];
    return {
      patientName: values[RecordField.PATIENT_NAME] ?? null,
      age: values[RecordField.AGE] ?? null,
      sex: isSex(sex) ? sex : null,
      telephone: values[RecordField.TELEPHONE] ?? null,
      address: values[RecordField.ADDRESS] ?? null,
      kebele: values[RecordField.KEBELE] ?? null,
      date: values[RecordField.DATE] ?? null,
    };
  }
}
