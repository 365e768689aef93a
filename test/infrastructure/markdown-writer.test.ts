import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import JSZip from 'jszip';
import {
  decodeImageBase64,
  formatMarkdown,
  imagesDirName,
  inlineImages,
  isSafeImageId,
  toDataUri,
  writeMarkdown,
  zipPathFor,
} from '../../src/infrastructure/markdown-writer.js';
import type { OcrPage } from '../../src/domain/types.js';
import { makeTempDir, removeTempDir } from '../helpers.js';

function page(index: number, markdown: string, images: OcrPage['images'] = []): OcrPage {
  return { index, markdown, images };
}

describe('formatMarkdown', () => {
  it('writes one 1-based heading per page', () => {
    expect(formatMarkdown([page(0, 'A'), page(1, 'B')])).toBe('# Page 1\n\nA\n\n# Page 2\n\nB\n\n');
  });

  it('strips trailing whitespace from page text', () => {
    expect(formatMarkdown([page(0, 'Title\n\nBody  \n\n\n')])).toBe('# Page 1\n\nTitle\n\nBody\n\n');
  });

  it('numbers pages from their index', () => {
    expect(formatMarkdown([page(4, 'E')])).toBe('# Page 5\n\nE\n\n');
  });

  it('returns an empty string for no pages', () => {
    expect(formatMarkdown([])).toBe('');
  });
});

describe('imagesDirName', () => {
  it('derives the directory from the output stem', () => {
    expect(imagesDirName('out/report.md')).toBe('report_images');
  });
});

describe('zipPathFor', () => {
  it('swaps the extension for .zip', () => {
    expect(zipPathFor(join('out', 'report.md'))).toBe(join('out', 'report.zip'));
  });
});

describe('isSafeImageId', () => {
  it('accepts plain file names', () => {
    expect(isSafeImageId('img-0.jpeg')).toBe(true);
  });

  it('rejects ids with a directory part', () => {
    expect(isSafeImageId('../../evil.md')).toBe(false);
    expect(isSafeImageId('nested/img.png')).toBe(false);
    expect(isSafeImageId('..\\evil.md')).toBe(false);
    expect(isSafeImageId('..')).toBe(false);
  });
});

describe('decodeImageBase64', () => {
  it('decodes bare base64', () => {
    const result = decodeImageBase64('QUJD', 'img-0.jpeg');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.toString()).toBe('ABC');
    }
  });

  it('strips a data URI prefix', () => {
    const result = decodeImageBase64('data:image/png;base64,QUJD', 'img-0.png');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.toString()).toBe('ABC');
    }
  });

  it('returns IMAGE_DECODE_FAILED for invalid data', () => {
    const result = decodeImageBase64('not base64!!', 'img-0.jpeg');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('IMAGE_DECODE_FAILED');
      expect(result.error.message).toBe('Failed to decode base64 for image img-0.jpeg');
    }
  });
});

describe('toDataUri', () => {
  it('builds a data URI from the id extension', () => {
    expect(toDataUri('QUJD', 'img-0.png')).toBe('data:image/png;base64,QUJD');
  });

  it('assumes jpeg when the id has no extension', () => {
    expect(toDataUri('QUJD', 'img-0')).toBe('data:image/jpeg;base64,QUJD');
  });

  it('keeps existing data URIs', () => {
    expect(toDataUri('data:image/gif;base64,QUJD', 'img-0.png')).toBe('data:image/gif;base64,QUJD');
  });
});

describe('inlineImages', () => {
  it('replaces image references with data URIs', () => {
    const result = inlineImages(
      page(0, '![img-0.jpeg](img-0.jpeg)', [{ id: 'img-0.jpeg', imageBase64: 'QUJD' }]),
    );
    expect(result.markdown).toBe('![img-0.jpeg](data:image/jpeg;base64,QUJD)');
  });

  it('leaves references without image data untouched', () => {
    const result = inlineImages(page(0, '![img-0.jpeg](img-0.jpeg)', [{ id: 'img-0.jpeg', imageBase64: null }]));
    expect(result.markdown).toBe('![img-0.jpeg](img-0.jpeg)');
  });
});

describe('writeMarkdown', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('creates missing parent directories and writes the content', async () => {
    const outputPath = join(dir, 'nested', 'deeper', 'ocr.md');
    const pages = [page(0, 'A'), page(1, 'B')];

    const result = await writeMarkdown(outputPath, pages);

    expect(result).toEqual({ ok: true, value: outputPath });
    expect(await readFile(outputPath, 'utf8')).toBe(formatMarkdown(pages));
  });

  it('passes image references through in none mode', async () => {
    const outputPath = join(dir, 'ocr.md');
    const pages = [page(0, '![img-0.jpeg](img-0.jpeg)', [{ id: 'img-0.jpeg', imageBase64: 'QUJD' }])];

    await writeMarkdown(outputPath, pages, 'none');

    expect(await readFile(outputPath, 'utf8')).toBe('# Page 1\n\n![img-0.jpeg](img-0.jpeg)\n\n');
  });

  it('saves images beside the output in separate mode', async () => {
    const outputPath = join(dir, 'out', 'report.md');
    const pages = [page(0, 'Intro\n\n![img-0.jpeg](img-0.jpeg)', [{ id: 'img-0.jpeg', imageBase64: 'QUJD' }])];

    const result = await writeMarkdown(outputPath, pages, 'separate');

    expect(result.ok).toBe(true);
    expect(await readFile(outputPath, 'utf8')).toBe(
      '# Page 1\n\nIntro\n\n![img-0.jpeg](report_images/img-0.jpeg)\n\n',
    );
    expect(await readFile(join(dir, 'out', 'report_images', 'img-0.jpeg'), 'utf8')).toBe('ABC');
  });

  it('embeds images in inline mode', async () => {
    const outputPath = join(dir, 'report.md');
    const pages = [page(0, '![img-0.png](img-0.png)', [{ id: 'img-0.png', imageBase64: 'QUJD' }])];

    await writeMarkdown(outputPath, pages, 'inline');

    expect(await readFile(outputPath, 'utf8')).toBe(
      '# Page 1\n\n![img-0.png](data:image/png;base64,QUJD)\n\n',
    );
  });

  it('returns IMAGE_DECODE_FAILED for undecodable images in separate mode', async () => {
    const outputPath = join(dir, 'report.md');
    const pages = [page(0, '![img-0.jpeg](img-0.jpeg)', [{ id: 'img-0.jpeg', imageBase64: '%%%' }])];

    const result = await writeMarkdown(outputPath, pages, 'separate');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('IMAGE_DECODE_FAILED');
    }
  });

  it('returns OUTPUT_WRITE_FAILED when the parent path is a file', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'x');

    const result = await writeMarkdown(join(blocker, 'ocr.md'), [page(0, 'A')]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('OUTPUT_WRITE_FAILED');
      expect(result.error.message).toContain('Failed to write markdown output');
    }
  });

  it('returns INVALID_IMAGE_ID and writes nothing for ids escaping the images directory', async () => {
    const outputPath = join(dir, 'a', 'b', 'report.md');
    const pages = [page(0, '![x](../../evil.md)', [{ id: '../../evil.md', imageBase64: 'QUJD' }])];

    const result = await writeMarkdown(outputPath, pages, 'separate');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_IMAGE_ID');
      expect(result.error.message).toBe('Image id is not a plain file name: ../../evil.md');
    }
    expect(await readdir(dir)).toEqual([]);
  });

  it('rejects unsafe ids in zip mode too', async () => {
    const pages = [page(0, '![x](../evil.png)', [{ id: '../evil.png', imageBase64: 'QUJD' }])];

    const result = await writeMarkdown(join(dir, 'report.md'), pages, 'zip');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_IMAGE_ID');
    }
    expect(await readdir(dir)).toEqual([]);
  });

  it('bundles markdown and images into a zip archive', async () => {
    const outputPath = join(dir, 'out', 'report.md');
    const pages = [
      page(0, 'Intro\n\n![img-0.jpeg](img-0.jpeg)', [{ id: 'img-0.jpeg', imageBase64: 'QUJD' }]),
      page(1, 'Second', [{ id: 'img-1.png', imageBase64: 'data:image/png;base64,REVG' }]),
    ];

    const result = await writeMarkdown(outputPath, pages, 'zip');

    const zipPath = join(dir, 'out', 'report.zip');
    expect(result).toEqual({ ok: true, value: zipPath });
    expect(await readdir(join(dir, 'out'))).toEqual(['report.zip']);

    const archive = await JSZip.loadAsync(await readFile(zipPath));
    expect(Object.keys(archive.files).filter((name) => !archive.files[name]?.dir).sort()).toEqual([
      'images/img-0.jpeg',
      'images/img-1.png',
      'report.md',
    ]);
    expect(await archive.file('report.md')?.async('string')).toBe(
      '# Page 1\n\nIntro\n\n![img-0.jpeg](images/img-0.jpeg)\n\n# Page 2\n\nSecond\n\n',
    );
    expect(await archive.file('images/img-0.jpeg')?.async('string')).toBe('ABC');
    expect(await archive.file('images/img-1.png')?.async('string')).toBe('DEF');
  });
});
