/**
 * PHI Sanitizer Utility
 *
 * Card images, model replies and extracted fields are PHI and are never
 * logged. Error text from upstream services can still echo request content,
 * so it passes through here before it reaches a log line.
 */

const EMAIL = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

// +251 9XXXXXXXX, 251-9XXXXXXXX and 09XXXXXXXX
const ETHIOPIAN_PHONE = /(?:\+?251[-\s]?|\b0)9\d{8}\b/g;

const GENERIC_PHONE = /(\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g;

const MAX_LENGTH = 500;

/**
 * Redact emails, tokens, phone numbers, long numbers and "First Last" name
 * pairs from an error message, and cap its length.
 */
export function sanitizeErrorMessage(error: string): string {
  if (!error) {
    return '';
  }

  let sanitized = error;

  sanitized = sanitized.replace(EMAIL, '[EMAIL_REDACTED]');

  sanitized = sanitized.replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]');
  sanitized = sanitized.replace(/token[:\s]+[^\s]+/gi, 'token: [REDACTED]');
  sanitized = sanitized.replace(/api[_-]?key[:\s]+[^\s]+/gi, 'api_key: [REDACTED]');

  sanitized = sanitized.replace(ETHIOPIAN_PHONE, '[PHONE_REDACTED]');
  sanitized = sanitized.replace(GENERIC_PHONE, '[PHONE_REDACTED]');

  // Medical record and card numbers
  sanitized = sanitized.replace(/\d{10,}/g, '[NUMBER_REDACTED]');

  sanitized = sanitized.replace(
    /\b[A-Z][a-z]+\s+[A-Z][a-z]+\b/g,
    '[NAME_REDACTED]',
  );

  return sanitized.substring(0, MAX_LENGTH);
}

/** Sanitized message of any thrown value */
export function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return sanitizeErrorMessage(message);
}
