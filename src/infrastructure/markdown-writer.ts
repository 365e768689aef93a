import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import JSZip from 'jszip';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import type { ImageMode, OcrImage, OcrPage } from '../domain/types.js';
import { fileExtension, mimeForExtension } from './file-encoder.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'markdown-writer' });

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export const ZIP_IMAGES_DIR = 'images';

interface ExtractedImage {
  id: string;
  data: Buffer;
}

export function formatMarkdown(pages: OcrPage[]): string {
  return pages.map((page) => `# Page ${page.index + 1}\n\n${page.markdown.trimEnd()}\n\n`).join('');
}

function outputStem(outputPath: string): string {
  return basename(outputPath, extname(outputPath)) || 'output';
}

export function imagesDirName(outputPath: string): string {
  return `${outputStem(outputPath)}_images`;
}

export function zipPathFor(outputPath: string): string {
  return join(dirname(outputPath), `${outputStem(outputPath)}.zip`);
}

/** Image ids become file names, so they must not contain a directory part. */
export function isSafeImageId(id: string): boolean {
  return id !== '.' && id !== '..' && basename(id) === id && !id.includes('\\');
}

/** Accepts either bare base64 or a `data:<mime>;base64,` URI. */
export function decodeImageBase64(data: string, id: string): Result<Buffer, AppError> {
  const comma = data.indexOf(',');
  const raw = (comma === -1 ? data : data.slice(comma + 1)).replace(/\s+/g, '');

  if (raw.length % 4 === 1 || !BASE64_PATTERN.test(raw)) {
    return err(
      createAppError(ErrorCode.IMAGE_DECODE_FAILED, `Failed to decode base64 for image ${id}`, false),
    );
  }
  return ok(Buffer.from(raw, 'base64'));
}

export function toDataUri(data: string, id: string): string {
  if (data.startsWith('data:')) return data;
  const ext = fileExtension(id) || 'jpeg';
  return `data:${mimeForExtension(ext)};base64,${data}`;
}

function embeddedImages(page: OcrPage): Array<OcrImage & { imageBase64: string }> {
  return page.images.filter(
    (img): img is OcrImage & { imageBase64: string } =>
      img.id.length > 0 && typeof img.imageBase64 === 'string',
  );
}

function relink(markdown: string, id: string, target: string): string {
  return markdown.split(`](${id})`).join(`](${target})`);
}

export function inlineImages(page: OcrPage): OcrPage {
  let markdown = page.markdown;
  for (const img of embeddedImages(page)) {
    markdown = relink(markdown, img.id, toDataUri(img.imageBase64, img.id));
  }
  return { ...page, markdown };
}

function extractImages(
  page: OcrPage,
  linkDir: string,
): Result<{ page: OcrPage; images: ExtractedImage[] }, AppError> {
  const images: ExtractedImage[] = [];
  let markdown = page.markdown;

  for (const img of embeddedImages(page)) {
    if (!isSafeImageId(img.id)) {
      log.error({ errorCode: ErrorCode.INVALID_IMAGE_ID, retryable: false, imageId: img.id }, 'Image id is not a plain file name');
      return err(
        createAppError(ErrorCode.INVALID_IMAGE_ID, `Image id is not a plain file name: ${img.id}`, false),
      );
    }

    const decoded = decodeImageBase64(img.imageBase64, img.id);
    if (!decoded.ok) {
      log.error({ errorCode: decoded.error.code, retryable: false, imageId: img.id }, 'Image decode failed');
      return decoded;
    }

    images.push({ id: img.id, data: decoded.value });
    markdown = relink(markdown, img.id, `${linkDir}/${img.id}`);
  }

  return ok({ page: { ...page, markdown }, images });
}

async function buildArchive(markdownName: string, markdown: string, images: ExtractedImage[]): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(markdownName, markdown);
  for (const img of images) {
    zip.file(`${ZIP_IMAGES_DIR}/${img.id}`, img.data);
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/**
 * Writes the pages as Markdown and returns the path written. In `zip` mode
 * that is `<stem>.zip` beside `outputPath`, holding `<stem>.md` and `images/`.
 */
export async function writeMarkdown(
  outputPath: string,
  pages: OcrPage[],
  imageMode: ImageMode = 'none',
): Promise<Result<string, AppError>> {
  let rendered: OcrPage[] = pages;
  const images: ExtractedImage[] = [];

  if (imageMode === 'inline') {
    rendered = pages.map(inlineImages);
  } else if (imageMode === 'separate' || imageMode === 'zip') {
    const linkDir = imageMode === 'zip' ? ZIP_IMAGES_DIR : imagesDirName(outputPath);
    rendered = [];
    for (const page of pages) {
      const result = extractImages(page, linkDir);
      if (!result.ok) return result;
      rendered.push(result.value.page);
      images.push(...result.value.images);
    }
  }

  const markdown = formatMarkdown(rendered);
  const target = imageMode === 'zip' ? zipPathFor(outputPath) : outputPath;

  try {
    await mkdir(dirname(outputPath), { recursive: true });

    if (imageMode === 'zip') {
      await writeFile(target, await buildArchive(`${outputStem(outputPath)}.md`, markdown, images));
    } else {
      if (images.length > 0) {
        const imagesDir = join(dirname(outputPath), imagesDirName(outputPath));
        await mkdir(imagesDir, { recursive: true });
        for (const img of images) {
          await writeFile(join(imagesDir, img.id), img.data);
        }
      }
      await writeFile(target, markdown, 'utf8');
    }
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ errorCode: ErrorCode.OUTPUT_WRITE_FAILED, retryable: false, outputPath: target, details }, 'Failed to write markdown output');
    return err(
      createAppError(ErrorCode.OUTPUT_WRITE_FAILED, `Failed to write markdown output: ${details}`, false, details),
    );
  }

  log.info({ outputPath: target, pageCount: pages.length, imageMode, imageCount: images.length }, 'Markdown written');
  return ok(target);
}
