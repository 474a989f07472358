import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { sleep } from '../../../utils/sleep';
import { describeError } from '../../../utils/phi-sanitizer.util';
import { EncodedImage } from '../../domain/ports/image-source.port';
import { VisionModelPort } from '../../domain/ports/vision-model.port';
import { buildExtractionPrompt, SYSTEM_PROMPT } from './extraction-prompt';
import { UpstreamError } from './upstream-error';

const DEFAULT_RETRY_AFTER_SECONDS = 5;

type ChatCompletion = {
  choices?: Array<{ message?: { content?: unknown } }>;
};

function isChatCompletion(value: unknown): value is ChatCompletion {
  if (typeof value !== 'object' || value === null || !('choices' in value)) {
    return false;
  }
  return Array.isArray(value.choices);
}

export function parseRetryAfter(header: string | null): number {
  if (header === null) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  const seconds = parseInt(header, 10);
  return Number.isNaN(seconds) || seconds < 0
    ? DEFAULT_RETRY_AFTER_SECONDS
    : seconds;
}

/**
 * OpenRouter Vision Adapter
 *
 * Sends one card image to an OpenRouter chat-completions model and returns
 * the reply text. Failures are logged and reported as null; only a missing
 * API key throws.
 *
 * Privacy:
 * - Never logs the image, the prompt reply or the API key
 * - Upstream error text is sanitized before logging
 */
@Injectable()
export class OpenRouterVisionAdapter implements VisionModelPort {
  private readonly logger = new Logger(OpenRouterVisionAdapter.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  isConfigured(): boolean {
    return Boolean(
      this.configService.get('cardExtraction.openRouter.apiKey', {
        infer: true,
      }),
    );
  }

  async extractText(image: EncodedImage): Promise<string | null> {
    const settings = this.configService.getOrThrow('cardExtraction.openRouter', {
      infer: true,
    });
    const fields = this.configService.getOrThrow('cardExtraction.fields', {
      infer: true,
    });

    if (!settings.apiKey) {
      this.logger.error('[VISION] OpenRouter API key not provided');
      throw new Error('OpenRouter API key not provided');
    }

    const upstreamPath = new URL(settings.apiUrl).pathname;
    const body = JSON.stringify({
      model: settings.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content: [
            { type: 'text', text: buildExtractionPrompt(fields) },
            {
              type: 'image_url',
              image_url: {
                url: `data:${image.mimeType};base64,${image.base64}`,
              },
            },
          ],
        },
      ],
      max_tokens: settings.maxTokens,
      temperature: settings.temperature,
    });

    for (let attempt = 0; ; attempt += 1) {
      const requestId = randomUUID();
      const startTime = Date.now();

      this.logger.debug(
        `[VISION] POST ${upstreamPath} | Model: ${settings.model} | Attempt: ${attempt + 1} | RequestId: ${requestId}`,
      );

      let response: Response;
      try {
        response = await fetch(settings.apiUrl, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${settings.apiKey}`,
            'Content-Type': 'application/json',
            'HTTP-Referer': 'https://localhost',
            'X-Title': 'Medical Card Extractor',
            'X-Request-Id': requestId,
          },
          body,
        });
      } catch (error) {
        const upstreamError = UpstreamError.fromNetworkError(
          error instanceof Error ? error : new Error(String(error)),
          requestId,
          upstreamPath,
        );
        this.logger.error(
          `[VISION] Network error | RequestId: ${requestId} | Error: ${upstreamError.message}`,
        );
        return null;
      }

      const duration = Date.now() - startTime;

      if (response.status === 429) {
        if (attempt >= settings.rateLimitMaxRetries) {
          this.logger.warn(
            `[VISION] Rate limited, giving up after ${attempt + 1} attempt(s) | RequestId: ${requestId}`,
          );
          return null;
        }
        const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
        this.logger.warn(
          `[VISION] Rate limited. Retrying after ${retryAfter} seconds | RequestId: ${requestId}`,
        );
        await sleep(retryAfter * 1000);
        continue;
      }

      if (!response.ok) {
        const upstreamError = await UpstreamError.fromResponse(
          response,
          requestId,
          upstreamPath,
        );
        this.logger.error(
          `[VISION] ${this.describeStatus(response.status)} | Status: ${upstreamError.status} | Duration: ${duration}ms | RequestId: ${requestId} | Message: ${upstreamError.message}`,
        );
        return null;
      }

      this.logger.debug(
        `[VISION] Status: ${response.status} | Duration: ${duration}ms | RequestId: ${requestId}`,
      );
      return this.readContent(response, requestId);
    }
  }

  private async readContent(
    response: Response,
    requestId: string,
  ): Promise<string | null> {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      this.logger.error(
        `[VISION] Response is not JSON | RequestId: ${requestId} | Error: ${describeError(error)}`,
      );
      return null;
    }

    const content = isChatCompletion(payload)
      ? payload.choices?.[0]?.message?.content
      : undefined;
    if (typeof content !== 'string') {
      this.logger.error(
        `[VISION] Unexpected response structure: no choices[0].message.content | RequestId: ${requestId}`,
      );
      return null;
    }

    this.logger.log(
      `[VISION] Text extracted | Length: ${content.length} | RequestId: ${requestId}`,
    );
    return content;
  }

  private describeStatus(status: number): string {
    switch (status) {
      case 401:
        return 'Unauthorized: check the OpenRouter API key';
      case 402:
        return 'Payment required: insufficient OpenRouter credits';
      default:
        return 'Upstream request failed';
    }
  }
}
