import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PDFDocument, StandardFonts } from 'pdf-lib';

export async function createTestPdf(lines: string[]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);

  for (const line of lines) {
    const page = doc.addPage([595, 842]); // A4
    page.drawText(line, { x: 50, y: 790, font, size: 12 });
  }

  return doc.save();
}

export async function writeTestPdf(dir: string, name: string, lines: string[]): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, await createTestPdf(lines));
  return path;
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'pdf-ocr-markdown-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
