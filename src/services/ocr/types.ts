import type { OcrConfig, Env } from '../../infrastructure/config.js';
import type { ConverterDeps } from '../../infrastructure/office-converter.js';
import type { OcrProvider } from '../../infrastructure/ocr/types.js';

export interface OcrServiceDeps {
  env?: Env;
  createProvider?: (config: OcrConfig) => OcrProvider;
  converter?: ConverterDeps;
  runId?: string;
}
