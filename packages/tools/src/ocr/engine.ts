import { generateText, type LanguageModel } from 'ai';
import { DEFAULT_RETRY_CONFIG, getLogger, withRetry, type RetryConfig } from '@forecastr/core';
import type { OcrEngine } from '../types.js';

const log = getLogger('ocr');

export const OCR_INSTRUCTION =
  'Transcribe every page image below to plain text. Keep table rows on one line with cells ' +
  'separated by " | ". Output only the transcription.';

export interface ModelOcrEngineOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: RetryConfig['sleep'];
}

/** OCR through a vision-capable language model, one request for all pages. */
export class ModelOcrEngine implements OcrEngine {
  constructor(
    private readonly model: LanguageModel,
    readonly name: string,
    private readonly options: ModelOcrEngineOptions = {},
  ) {}

  async recognize(images: readonly Uint8Array[], abortSignal?: AbortSignal): Promise<string> {
    if (images.length === 0) return '';

    const { result, attempts } = await withRetry(
      async () => {
        const response = await generateText({
          model: this.model,
          messages: [{
            role: 'user',
            content: [
              { type: 'text', text: OCR_INSTRUCTION },
              ...images.map(image => ({ type: 'image' as const, image })),
            ],
          }],
          abortSignal,
          maxRetries: 0,
        });
        return response.text;
      },
      {
        maxAttempts: this.options.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
        baseDelayMs: this.options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
        abortSignal,
        sleep: this.options.sleep,
      },
    );

    log.debug({ engine: this.name, pages: images.length, attempts }, 'OCR complete');
    return result;
  }
}
