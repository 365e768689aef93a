export type { OcrProvider, OcrRequestOptions, OcrProviderConfig } from './types.js';
export { MistralOcrProvider, createMistralClient } from './mistral.js';
export type { MistralOcrClient, MistralOcrRequest } from './mistral.js';

import { MistralOcrProvider, createMistralClient } from './mistral.js';
import type { OcrProvider, OcrProviderConfig } from './types.js';

export function createOcrProvider(config: OcrProviderConfig): OcrProvider {
  switch (config.provider) {
    case 'mistral':
      return new MistralOcrProvider(createMistralClient(config.apiKey), config.timeoutMs);
    default:
      throw new Error(`Unsupported OCR provider: ${String(config.provider)}`);
  }
}
