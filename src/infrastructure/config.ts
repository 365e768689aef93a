import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { envSchema } from '../domain/schemas.js';

export const API_KEY_ENV = 'MISTRAL_API_KEY';
export const DEFAULT_TIMEOUT_MS = 300_000;

export interface OcrConfig {
  apiKey: string;
  timeoutMs: number;
}

export type Env = Record<string, string | undefined>;

/** Reads the OCR settings from the environment. An empty key counts as unset. */
export function loadOcrConfig(env: Env = process.env): Result<OcrConfig, AppError> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(
      createAppError(ErrorCode.INVALID_ARGUMENTS, `Invalid environment configuration: ${details}`, false),
    );
  }
  const parsed = result.data;

  const apiKey = parsed.MISTRAL_API_KEY?.trim();
  if (!apiKey) {
    return err(
      createAppError(
        ErrorCode.CONFIG_MISSING_API_KEY,
        `${API_KEY_ENV} environment variable is not set`,
        false,
      ),
    );
  }

  return ok({ apiKey, timeoutMs: parsed.MISTRAL_OCR_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS });
}
