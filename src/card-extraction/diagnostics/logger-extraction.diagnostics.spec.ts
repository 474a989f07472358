import { Logger } from '@nestjs/common';
import { RecordField } from '../domain/enums/record-field.enum';
import { LoggerExtractionDiagnostics } from './logger-extraction.diagnostics';

describe('LoggerExtractionDiagnostics', () => {
  let debugSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let diagnostics: LoggerExtractionDiagnostics;

  beforeEach(() => {
    debugSpy = jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
    diagnostics = new LoggerExtractionDiagnostics();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log tagged fields at debug level', () => {
    diagnostics.fieldResolved({ field: RecordField.AGE, outcome: 'tagged' });

    expect(debugSpy).toHaveBeenCalledWith('[PARSE] age: tagged');
  });

  it('should warn about rejected fields with the reason', () => {
    diagnostics.fieldResolved({
      field: RecordField.KEBELE,
      outcome: 'rejected',
      reason: 'tag content failed kebele validation',
    });

    expect(warnSpy).toHaveBeenCalledWith(
      '[PARSE] kebele: rejected (tag content failed kebele validation)',
    );
  });

  it('should warn about heuristic guesses with the strategy', () => {
    diagnostics.fieldResolved({
      field: RecordField.AGE,
      outcome: 'heuristic',
      strategy: 'any-number-in-range',
    });

    expect(warnSpy).toHaveBeenCalledWith(
      '[PARSE] age: heuristic (any-number-in-range)',
    );
  });

  it('should sanitize parse failures', () => {
    diagnostics.parseFailed(new Error('bad input from Abebe Bekele'));

    expect(errorSpy).toHaveBeenCalledWith(
      '[PARSE] Parsing failed: bad input from [NAME_REDACTED]',
    );
  });

  it('should summarise validation issues', () => {
    diagnostics.validationCompleted({
      isValid: false,
      messages: ['Sex not found in the extracted data'],
    });

    expect(debugSpy).toHaveBeenCalledWith(
      '[VALIDATE] 1 issue(s): Sex not found in the extracted data',
    );
  });
});
