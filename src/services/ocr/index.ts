import { randomUUID } from 'node:crypto';
import { ok, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { OcrRunOptions, OcrRunResult } from '../../domain/types.js';
import { loadOcrConfig, type OcrConfig } from '../../infrastructure/config.js';
import { buildDocumentDescriptor, detectInputKind, encodeFile, ensureReadable } from '../../infrastructure/file-encoder.js';
import { convertToPdf, type ConvertedPdf } from '../../infrastructure/office-converter.js';
import { writeMarkdown } from '../../infrastructure/markdown-writer.js';
import { createOcrProvider, type OcrProvider } from '../../infrastructure/ocr/index.js';
import { createRunLogger } from '../../infrastructure/logger.js';
import type { OcrServiceDeps } from './types.js';

export type { OcrServiceDeps } from './types.js';

function defaultProvider(config: OcrConfig): OcrProvider {
  return createOcrProvider({ provider: 'mistral', apiKey: config.apiKey, timeoutMs: config.timeoutMs });
}

export async function runOcr(
  options: OcrRunOptions,
  deps: OcrServiceDeps = {},
): Promise<Result<OcrRunResult, AppError>> {
  const log = createRunLogger(deps.runId ?? randomUUID(), options.inputPath);

  const config = loadOcrConfig(deps.env);
  if (!config.ok) return config;

  const readable = await ensureReadable(options.inputPath);
  if (!readable.ok) return readable;

  const kind = detectInputKind(options.inputPath);
  if (!kind.ok) return kind;

  let converted: ConvertedPdf | undefined;
  if (kind.value === 'convertible') {
    const conversion = await convertToPdf(options.inputPath, deps.converter);
    if (!conversion.ok) return conversion;
    converted = conversion.value;
  }

  try {
    log.info({ step: 'encoding' }, 'Encoding file');
    const encoded = await encodeFile(converted?.path ?? options.inputPath);
    if (!encoded.ok) return encoded;

    const document = buildDocumentDescriptor(
      kind.value === 'image' ? 'image' : 'pdf',
      encoded.value.base64,
      options.inputPath,
    );

    const includeImages = options.includeImages || options.imageMode !== 'none';
    const provider = (deps.createProvider ?? defaultProvider)(config.value);

    log.info({ step: 'requesting', model: options.model, includeImages, sizeBytes: encoded.value.sizeBytes }, 'Sending OCR request');
    const ocr = await provider.process(document, { model: options.model, includeImages });
    if (!ocr.ok) return ocr;

    log.info({ step: 'writing', pageCount: ocr.value.pages.length }, 'Processing response');
    const written = await writeMarkdown(options.outputPath, ocr.value.pages, options.imageMode);
    if (!written.ok) return written;

    log.info({ outputPath: written.value, model: ocr.value.model, latencyMs: ocr.value.latencyMs }, 'OCR complete');
    return ok({ outputPath: written.value, pageCount: ocr.value.pages.length });
  } finally {
    await converted?.release();
  }
}
