import { createCardExtractionConfig, createConfigService } from '../../testing/config.mock';
import { EncodedImage } from '../../domain/ports/image-source.port';
import { OpenRouterVisionAdapter, parseRetryAfter } from './openrouter-vision.adapter';

const IMAGE: EncodedImage = {
  filename: 'card-001.png',
  mimeType: 'image/png',
  base64: 'aW1hZ2U=',
};

function completion(content: unknown): Response {
  return new Response(
    JSON.stringify({ choices: [{ message: { content } }] }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );
}

function rateLimited(): Response {
  return new Response('', { status: 429, headers: { 'Retry-After': '0' } });
}

describe('OpenRouterVisionAdapter', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let adapter: OpenRouterVisionAdapter;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    adapter = new OpenRouterVisionAdapter(createConfigService());
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should throw when no API key is configured', async () => {
    const openRouter = { ...createCardExtractionConfig().openRouter, apiKey: null };
    adapter = new OpenRouterVisionAdapter(createConfigService({ openRouter }));

    await expect(adapter.extractText(IMAGE)).rejects.toThrow(
      'OpenRouter API key not provided',
    );
    expect(adapter.isConfigured()).toBe(false);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should return the reply content', async () => {
    fetchSpy.mockResolvedValue(completion('<age>42</age>'));

    await expect(adapter.extractText(IMAGE)).resolves.toBe('<age>42</age>');
    expect(adapter.isConfigured()).toBe(true);
  });

  it('should send the image as a data URL with the configured model', async () => {
    fetchSpy.mockResolvedValue(completion('<age>42</age>'));

    await adapter.extractText(IMAGE);

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://openrouter.test/api/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
      'X-Title': 'Medical Card Extractor',
    });

    const sent: unknown = JSON.parse(
      typeof init?.body === 'string' ? init.body : '{}',
    );
    expect(sent).toMatchObject({
      model: 'test/vision-model',
      max_tokens: 300,
      temperature: 0.1,
      messages: [
        { role: 'system' },
        {
          role: 'user',
          content: [
            { type: 'text' },
            {
              type: 'image_url',
              image_url: { url: 'data:image/png;base64,aW1hZ2U=' },
            },
          ],
        },
      ],
    });
  });

  it.each([401, 402, 500])('should return null on status %i', async (status) => {
    fetchSpy.mockResolvedValue(
      new Response(JSON.stringify({ error: { message: 'nope' } }), { status }),
    );

    await expect(adapter.extractText(IMAGE)).resolves.toBeNull();
  });

  it('should retry after a rate limit response', async () => {
    fetchSpy
      .mockResolvedValueOnce(rateLimited())
      .mockResolvedValueOnce(completion('<sex>F</sex>'));

    await expect(adapter.extractText(IMAGE)).resolves.toBe('<sex>F</sex>');
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('should give up after the configured number of retries', async () => {
    const openRouter = {
      ...createCardExtractionConfig().openRouter,
      rateLimitMaxRetries: 2,
    };
    adapter = new OpenRouterVisionAdapter(createConfigService({ openRouter }));
    fetchSpy.mockImplementation(async () => rateLimited());

    await expect(adapter.extractText(IMAGE)).resolves.toBeNull();
    expect(fetchSpy).toHaveBeenCalledTimes(3);
  });

  it('should return null on a network failure', async () => {
    fetchSpy.mockRejectedValue(new Error('ECONNRESET'));

    await expect(adapter.extractText(IMAGE)).resolves.toBeNull();
  });

  it('should return null when the reply has no content', async () => {
    fetchSpy.mockResolvedValue(
      new Response(JSON.stringify({ choices: [] }), { status: 200 }),
    );

    await expect(adapter.extractText(IMAGE)).resolves.toBeNull();
  });

  it('should return null when the content is not text', async () => {
    fetchSpy.mockResolvedValue(completion(null));

    await expect(adapter.extractText(IMAGE)).resolves.toBeNull();
  });
});

describe('parseRetryAfter', () => {
  it('should default to five seconds', () => {
    expect(parseRetryAfter(null)).toBe(5);
    expect(parseRetryAfter('soon')).toBe(5);
  });

  it('should read whole seconds', () => {
    expect(parseRetryAfter('7')).toBe(7);
    expect(parseRetryAfter('0')).toBe(0);
  });
});
