import { z } from 'zod';
import { IMAGE_MODES } from './types.js';

export const DEFAULT_INPUT_PATH = '../AXP2101_no_watermark.pdf';
export const DEFAULT_MODEL = 'mistral-ocr-latest';
export const DEFAULT_OUTPUT_PATH = 'ocr_output.md';

export const imageModeSchema = z.enum(IMAGE_MODES);

export const cliOptionsSchema = z.object({
  pdf: z.string().min(1, 'Input path must not be empty').default(DEFAULT_INPUT_PATH),
  model: z.string().min(1, 'Model name must not be empty').default(DEFAULT_MODEL),
  includeImages: z.boolean().default(false),
  images: imageModeSchema.default('none'),
  output: z.string().min(1, 'Output path must not be empty').default(DEFAULT_OUTPUT_PATH),
  help: z.boolean().default(false),
});

export const envSchema = z.object({
  MISTRAL_API_KEY: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  MISTRAL_OCR_TIMEOUT_MS: z.preprocess(
    (v) => (v === '' ? undefined : v),
    z.coerce.number().int().positive().optional(),
  ),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;
