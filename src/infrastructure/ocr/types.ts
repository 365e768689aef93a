import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { DocumentDescriptor, OcrResult } from '../../domain/types.js';

export interface OcrRequestOptions {
  model: string;
  includeImages: boolean;
}

export interface OcrProvider {
  process(
    document: DocumentDescriptor,
    options: OcrRequestOptions,
  ): Promise<Result<OcrResult, AppError>>;
}

export interface OcrProviderConfig {
  provider: 'mistral';
  apiKey: string;
  timeoutMs?: number;
}
