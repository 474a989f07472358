import { sanitizeErrorMessage } from '../../../utils/phi-sanitizer.util';

const BODY_EXCERPT_LENGTH = 200;

const SENSITIVE_KEYS = [
  'password',
  'token',
  'authorization',
  'apikey',
  'api_key',
  'secret',
  'access_token',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * UpstreamError - Normalized error for vision model API failures
 *
 * Privacy: carries a sanitized excerpt of the upstream response,
 * never the request (which holds the card image) or the API key.
 */
export class UpstreamError extends Error {
  /** HTTP status from upstream (502 for network failures) */
  readonly status: number;

  readonly requestId: string;

  readonly upstreamPath: string;

  /** Sanitized response excerpt, max 200 chars */
  readonly upstreamBody: string | null;

  readonly timestamp: string;

  constructor(params: {
    status: number;
    message: string;
    requestId: string;
    upstreamPath: string;
    upstreamBody?: unknown;
  }) {
    super(params.message);
    this.name = 'UpstreamError';
    this.status = params.status;
    this.requestId = params.requestId;
    this.upstreamPath = params.upstreamPath;
    this.timestamp = new Date().toISOString();
    this.upstreamBody = UpstreamError.sanitizeBody(params.upstreamBody);

    Object.setPrototypeOf(this, UpstreamError.prototype);
  }

  private static sanitizeBody(body: unknown): string | null {
    if (body === undefined || body === null || body === '') {
      return null;
    }

    let parsed: unknown = body;
    if (typeof body === 'string') {
      try {
        parsed = JSON.parse(body);
      } catch {
        return sanitizeErrorMessage(body).substring(0, BODY_EXCERPT_LENGTH);
      }
    }

    if (!isRecord(parsed)) {
      return sanitizeErrorMessage(String(parsed)).substring(
        0,
        BODY_EXCERPT_LENGTH,
      );
    }

    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(parsed)) {
      redacted[key] = SENSITIVE_KEYS.includes(key.toLowerCase())
        ? '[REDACTED]'
        : value;
    }
    return sanitizeErrorMessage(JSON.stringify(redacted)).substring(
      0,
      BODY_EXCERPT_LENGTH,
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      error: 'UpstreamError',
      message: this.message,
      status: this.status,
      requestId: this.requestId,
      upstreamPath: this.upstreamPath,
      timestamp: this.timestamp,
    };
  }

  /**
   * Build from a non-OK fetch Response. OpenRouter reports failures as
   * `{ "error": { "message": "..." } }`; plain `error`/`message` strings are
   * accepted too.
   */
  static async fromResponse(
    response: Response,
    requestId: string,
    upstreamPath: string,
  ): Promise<UpstreamError> {
    let text = '';
    try {
      text = await response.text();
    } catch {
      text = '';
    }

    return new UpstreamError({
      status: response.status,
      message: UpstreamError.messageFrom(text, response),
      requestId,
      upstreamPath,
      upstreamBody: text,
    });
  }

  static fromNetworkError(
    error: Error,
    requestId: string,
    upstreamPath: string,
  ): UpstreamError {
    return new UpstreamError({
      status: 502,
      message: `Network error: ${sanitizeErrorMessage(error.message)}`,
      requestId,
      upstreamPath,
    });
  }

  private static messageFrom(text: string, response: Response): string {
    const fallback = `Upstream error: ${response.status} ${response.statusText}`.trim();
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return fallback;
    }
    if (!isRecord(json)) {
      return fallback;
    }

    const { error, message } = json;
    if (isRecord(error) && typeof error.message === 'string') {
      return sanitizeErrorMessage(error.message);
    }
    if (typeof error === 'string') {
      return sanitizeErrorMessage(error);
    }
    if (typeof message === 'string') {
      return sanitizeErrorMessage(message);
    }
    return fallback;
  }
}
