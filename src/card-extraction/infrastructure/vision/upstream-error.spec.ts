import { UpstreamError } from './upstream-error';

describe('UpstreamError', () => {
  describe('constructor', () => {
    it('should create error with all properties', () => {
      const error = new UpstreamError({
        status: 404,
        message: 'Not found',
        requestId: 'req-123',
        upstreamPath: '/api/v1/chat/completions',
      });

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error.status).toBe(404);
      expect(error.message).toBe('Not found');
      expect(error.requestId).toBe('req-123');
      expect(error.upstreamPath).toBe('/api/v1/chat/completions');
      expect(error.upstreamBody).toBeNull();
      expect(error.timestamp).toBeDefined();
    });

    it('should redact sensitive keys in the body', () => {
      const error = new UpstreamError({
        status: 400,
        message: 'Bad request',
        requestId: 'req-123',
        upstreamPath: '/test',
        upstreamBody: { code: 400, api_key: 'test-secret' },
      });

      expect(error.upstreamBody).toBe('{"code":400,"api_key":"[REDACTED]"}');
    });

    it('should redact phone numbers in a plain text body', () => {
      const error = new UpstreamError({
        status: 400,
        message: 'Bad request',
        requestId: 'req-123',
        upstreamPath: '/test',
        upstreamBody: 'could not read 0912345678',
      });

      expect(error.upstreamBody).toBe('could not read [PHONE_REDACTED]');
    });

    it('should truncate long bodies', () => {
      const error = new UpstreamError({
        status: 400,
        message: 'Bad request',
        requestId: 'req-123',
        upstreamPath: '/test',
        upstreamBody: 'x'.repeat(500),
      });

      expect(error.upstreamBody).toHaveLength(200);
    });
  });

  describe('toJSON', () => {
    it('should return plain object without the body', () => {
      const error = new UpstreamError({
        status: 401,
        message: 'Unauthorized',
        requestId: 'req-456',
        upstreamPath: '/test',
        upstreamBody: 'details',
      });

      expect(error.toJSON()).toEqual({
        error: 'UpstreamError',
        message: 'Unauthorized',
        status: 401,
        requestId: 'req-456',
        upstreamPath: '/test',
        timestamp: error.timestamp,
      });
    });
  });

  describe('fromResponse', () => {
    it('should read a nested OpenRouter error message', async () => {
      const response = new Response(
        JSON.stringify({ error: { message: 'Insufficient credits', code: 402 } }),
        { status: 402, statusText: 'Payment Required' },
      );

      const error = await UpstreamError.fromResponse(response, 'req-789', '/test');

      expect(error.status).toBe(402);
      expect(error.message).toBe('Insufficient credits');
      expect(error.requestId).toBe('req-789');
    });

    it('should read a flat error string', async () => {
      const response = new Response(JSON.stringify({ error: 'Access denied' }), {
        status: 403,
      });

      const error = await UpstreamError.fromResponse(response, 'req-789', '/test');

      expect(error.message).toBe('Access denied');
    });

    it('should fall back to the status line for non-JSON bodies', async () => {
      const response = new Response('Server error', {
        status: 500,
        statusText: 'Internal Server Error',
      });

      const error = await UpstreamError.fromResponse(response, 'req-789', '/test');

      expect(error.message).toBe('Upstream error: 500 Internal Server Error');
      expect(error.upstreamBody).toBe('Server error');
    });
  });

  describe('fromNetworkError', () => {
    it('should use status 502', () => {
      const error = UpstreamError.fromNetworkError(
        new Error('ECONNREFUSED'),
        'req-1',
        '/test',
      );

      expect(error.status).toBe(502);
      expect(error.message).toBe('Network error: ECONNREFUSED');
    });
  });
});
