import { access, constants, readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import {
  CONVERTIBLE_EXTENSIONS,
  IMAGE_EXTENSIONS,
  type DocumentDescriptor,
  type EncodedFile,
  type InputKind,
} from '../domain/types.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'file-encoder' });

const IMAGE_MIME_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  bmp: 'image/bmp',
  tiff: 'image/tiff',
  tif: 'image/tiff',
  webp: 'image/webp',
};

export function fileExtension(path: string): string {
  return extname(path).slice(1).toLowerCase();
}

export function mimeForExtension(ext: string): string {
  return IMAGE_MIME_TYPES[ext.toLowerCase()] ?? 'application/octet-stream';
}

function includes(list: readonly string[], value: string): boolean {
  return list.includes(value);
}

/** A path without an extension is sent as a PDF. */
export function detectInputKind(path: string): Result<InputKind, AppError> {
  const ext = fileExtension(path);
  if (ext === '' || ext === 'pdf') return ok('pdf');
  if (includes(IMAGE_EXTENSIONS, ext)) return ok('image');
  if (includes(CONVERTIBLE_EXTENSIONS, ext)) return ok('convertible');

  return err(
    createAppError(
      ErrorCode.UNSUPPORTED_FILE_TYPE,
      `Unsupported file type: .${ext} (expected pdf, image, or document: docx, odt, pptx, xlsx, etc.)`,
      false,
    ),
  );
}

export async function ensureReadable(path: string): Promise<Result<string, AppError>> {
  try {
    await access(path, constants.R_OK);
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ errorCode: ErrorCode.PDF_NOT_FOUND, retryable: false, path, details }, 'Input file not readable');
    return err(createAppError(ErrorCode.PDF_NOT_FOUND, `PDF not found: ${path}`, false, details));
  }
  return ok(path);
}

export async function encodeFile(path: string): Promise<Result<EncodedFile, AppError>> {
  let data: Buffer;
  try {
    data = await readFile(path);
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ errorCode: ErrorCode.PDF_NOT_FOUND, retryable: false, path, details }, 'Input file not readable');
    return err(createAppError(ErrorCode.PDF_NOT_FOUND, `PDF not found: ${path}`, false, details));
  }

  log.debug({ path, sizeBytes: data.length }, 'Input file encoded');
  return ok({ base64: data.toString('base64'), sizeBytes: data.length });
}

/**
 * Builds the payload describing the document to the OCR service.
 * `sourcePath` decides the document name, so a converted office file
 * keeps its original name.
 */
export function buildDocumentDescriptor(
  kind: 'pdf' | 'image',
  base64: string,
  sourcePath: string,
): DocumentDescriptor {
  if (kind === 'pdf') {
    return {
      type: 'document_url',
      documentUrl: `data:application/pdf;base64,${base64}`,
      documentName: basename(sourcePath),
    };
  }

  return {
    type: 'image_url',
    imageUrl: `data:${mimeForExtension(fileExtension(sourcePath))};base64,${base64}`,
  };
}
