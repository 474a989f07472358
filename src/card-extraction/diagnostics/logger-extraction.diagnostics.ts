import { Logger } from '@nestjs/common';
import { ValidationResult } from '../domain/entities/extraction-record.entity';
import {
  ExtractionDiagnostics,
  FieldResolution,
} from '../domain/parsing/extraction-diagnostics';
import { describeError } from '../../utils/phi-sanitizer.util';

/**
 * Routes parser and validator decisions to the Nest logger.
 *
 * Privacy: only field names, outcomes, strategy names and counts are
 * logged. Validation messages carry no PHI (the only value they quote is an
 * age number), but they are logged at debug level.
 */
export class LoggerExtractionDiagnostics implements ExtractionDiagnostics {
  private readonly logger = new Logger('CardExtraction');

  fieldResolved(resolution: FieldResolution): void {
    const detail = resolution.strategy ?? resolution.reason;
    const suffix = detail ? ` (${detail})` : '';
    const message = `[PARSE] ${resolution.field}: ${resolution.outcome}${suffix}`;

    if (resolution.outcome === 'rejected' || resolution.outcome === 'heuristic') {
      this.logger.warn(message);
    } else {
      this.logger.debug(message);
    }
  }

  parseFailed(error: unknown): void {
    this.logger.error(`[PARSE] Parsing failed: ${describeError(error)}`);
  }

  validationWarning(message: string): void {
    this.logger.warn(`[VALIDATE] ${message}`);
  }

  validationCompleted(result: ValidationResult): void {
    if (result.isValid) {
      this.logger.debug('[VALIDATE] Record is valid');
      return;
    }
    this.logger.debug(
      `[VALIDATE] ${result.messages.length} issue(s): ${result.messages.join('; ')}`,
    );
  }
}
