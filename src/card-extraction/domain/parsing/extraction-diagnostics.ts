import { RecordField } from '../enums/record-field.enum';
import { ValidationResult } from '../entities/extraction-record.entity';

/**
 * How a field was resolved:
 * - tagged: taken from <tag> markup
 * - pattern: taken by a fallback strategy
 * - heuristic: last-resort guess (age only)
 * - rejected: found, but failed normalization or validation
 * - missing: never found
 */
export type FieldOutcome =
  | 'tagged'
  | 'pattern'
  | 'heuristic'
  | 'rejected'
  | 'missing';

export interface FieldResolution {
  field: RecordField;
  outcome: FieldOutcome;
  strategy?: string;
  reason?: string;
}

/**
 * Collaborator notified at every parsing and validation decision point.
 * Implementations must not receive or record field values.
 */
export interface ExtractionDiagnostics {
  fieldResolved(resolution: FieldResolution): void;
  parseFailed(error: unknown): void;
  validationWarning(message: string): void;
  validationCompleted(result: ValidationResult): void;
}
