import { Mistral } from '@mistralai/mistralai';
import { z } from 'zod';
import { ok, err } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { DocumentDescriptor, OcrPage, OcrResult } from '../../domain/types.js';
import type { OcrProvider, OcrRequestOptions } from './types.js';

const log = logger.child({ module: 'ocr-mistral' });

export interface MistralOcrRequest {
  model: string;
  document: DocumentDescriptor;
  includeImageBase64?: boolean;
}

export interface MistralOcrClient {
  ocr: {
    process(
      request: MistralOcrRequest,
      options?: { timeoutMs?: number },
    ): Promise<{
      model: string;
      pages: Array<{
        index: number;
        markdown: string;
        images?: Array<{ id: string; imageBase64?: string | null }>;
      }>;
    }>;
  };
}

const ocrResponseSchema = z.object({
  model: z.string(),
  pages: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      markdown: z.string(),
      images: z
        .array(z.object({ id: z.string(), imageBase64: z.string().nullish() }))
        .optional()
        .default([]),
    }),
  ),
});

export class MistralOcrProvider implements OcrProvider {
  private readonly client: MistralOcrClient;
  private readonly timeoutMs: number | undefined;

  constructor(client: MistralOcrClient, timeoutMs?: number) {
    this.client = client;
    this.timeoutMs = timeoutMs;
  }

  async process(
    document: DocumentDescriptor,
    options: OcrRequestOptions,
  ): Promise<Result<OcrResult, AppError>> {
    const startTime = Date.now();
    const ctx = { model: options.model, documentType: document.type };

    const request: MistralOcrRequest = {
      model: options.model,
      document,
      ...(options.includeImages && { includeImageBase64: true }),
    };

    log.debug({ ...ctx, includeImages: options.includeImages }, 'Calling Mistral OCR');

    let raw: unknown;
    try {
      raw = await this.client.ocr.process(
        request,
        this.timeoutMs !== undefined ? { timeoutMs: this.timeoutMs } : undefined,
      );
    } catch (cause) {
      return this.mapError(cause, options.model, Date.now() - startTime);
    }

    const latencyMs = Date.now() - startTime;
    const parsed = ocrResponseSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      log.error({ ...ctx, latencyMs, errorCode: ErrorCode.OCR_MALFORMED_RESPONSE, retryable: false, details }, 'Mistral returned malformed OCR response');
      return err(
        createAppError(ErrorCode.OCR_MALFORMED_RESPONSE, 'OCR request failed: malformed response', false, details),
      );
    }

    const pages: OcrPage[] = [...parsed.data.pages].sort((a, b) => a.index - b.index);

    log.info({ ...ctx, latencyMs, pageCount: pages.length }, 'Mistral OCR succeeded');

    return ok({ model: parsed.data.model, pages, latencyMs });
  }

  private mapError(cause: unknown, model: string, latencyMs: number): Result<never, AppError> {
    const details = describeCause(cause);
    const status = this.extractStatus(cause);
    const ctx = { model, latencyMs, status, details };
    const message = `OCR request failed: ${details}`;

    if (status === 401 || status === 403) {
      log.error({ ...ctx, errorCode: ErrorCode.OCR_AUTH_ERROR, retryable: false }, 'Mistral authentication failed');
      return err(createAppError(ErrorCode.OCR_AUTH_ERROR, message, false, details));
    }

    if (status === 429) {
      log.warn({ ...ctx, errorCode: ErrorCode.OCR_RATE_LIMITED, retryable: true }, 'Mistral rate limited');
      return err(createAppError(ErrorCode.OCR_RATE_LIMITED, message, true, details));
    }

    const retryable = status === undefined || status >= 500;
    log.error({ ...ctx, errorCode: ErrorCode.OCR_REQUEST_FAILED, retryable }, 'Mistral OCR call failed');
    return err(createAppError(ErrorCode.OCR_REQUEST_FAILED, message, retryable, details));
  }

  // SDK errors carry `statusCode`; fetch-style errors carry `status`
  private extractStatus(cause: unknown): number | undefined {
    if (cause === null || typeof cause !== 'object') return undefined;
    for (const key of ['statusCode', 'status']) {
      const value: unknown = Reflect.get(cause, key);
      if (typeof value === 'number') return value;
    }
    return undefined;
  }
}

export function createMistralClient(apiKey: string): MistralOcrClient {
  return new Mistral({ apiKey });
}
