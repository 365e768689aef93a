import { execFile } from 'node:child_process';
import { access, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, delimiter, extname, join } from 'node:path';
import { promisify } from 'node:util';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

const log = logger.child({ module: 'office-converter' });

const BINARY_NAMES = ['libreoffice', 'soffice'];

const INSTALL_LOCATIONS: Partial<Record<NodeJS.Platform, string[]>> = {
  darwin: ['/Applications/LibreOffice.app/Contents/MacOS/soffice', '/opt/homebrew/bin/soffice'],
  win32: [
    'C:\\Program Files\\LibreOffice\\program\\soffice.exe',
    'C:\\Program Files (x86)\\LibreOffice\\program\\soffice.exe',
  ],
  linux: ['/usr/bin/libreoffice', '/usr/bin/soffice'],
};

export type RunCommand = (command: string, args: string[]) => Promise<void>;

export interface ConverterDeps {
  runCommand: RunCommand;
  fileExists: (path: string) => Promise<boolean>;
  pathEnv: string;
  platform: NodeJS.Platform;
  tempRoot: string;
}

export interface ConvertedPdf {
  path: string;
  /** Removes the temporary directory holding the converted PDF. */
  release(): Promise<void>;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function runLibreOffice(command: string, args: string[]): Promise<void> {
  await execFileAsync(command, args);
}

export function defaultConverterDeps(): ConverterDeps {
  return {
    runCommand: runLibreOffice,
    fileExists: exists,
    pathEnv: process.env.PATH ?? '',
    platform: process.platform,
    tempRoot: tmpdir(),
  };
}

export async function findLibreOffice(
  deps: Pick<ConverterDeps, 'fileExists' | 'pathEnv' | 'platform'>,
): Promise<Result<string, AppError>> {
  const suffix = deps.platform === 'win32' ? '.exe' : '';
  const dirs = deps.pathEnv.split(delimiter).filter((d) => d.length > 0);

  for (const name of BINARY_NAMES) {
    for (const dir of dirs) {
      const candidate = join(dir, name + suffix);
      if (await deps.fileExists(candidate)) return ok(candidate);
    }
  }

  for (const candidate of INSTALL_LOCATIONS[deps.platform] ?? []) {
    if (await deps.fileExists(candidate)) return ok(candidate);
  }

  return err(
    createAppError(
      ErrorCode.CONVERSION_FAILED,
      'LibreOffice not found. It is only needed for office documents (docx, odt, pptx, etc.); PDF and image files work without it.',
      false,
    ),
  );
}

export async function convertToPdf(
  inputPath: string,
  deps: ConverterDeps = defaultConverterDeps(),
): Promise<Result<ConvertedPdf, AppError>> {
  if (!(await deps.fileExists(inputPath))) {
    log.error({ errorCode: ErrorCode.PDF_NOT_FOUND, retryable: false, inputPath }, 'Input file not found');
    return err(createAppError(ErrorCode.PDF_NOT_FOUND, `File not found: ${inputPath}`, false));
  }

  const binary = await findLibreOffice(deps);
  if (!binary.ok) return binary;

  const outDir = await mkdtemp(join(deps.tempRoot, 'pdf-ocr-markdown-'));
  const release = () => rm(outDir, { recursive: true, force: true });

  log.info({ inputPath, binary: binary.value }, 'Converting document to PDF via LibreOffice');

  try {
    await deps.runCommand(binary.value, ['--headless', '--convert-to', 'pdf', '--outdir', outDir, inputPath]);
  } catch (cause) {
    await release();
    const details = describeCause(cause);
    log.error({ errorCode: ErrorCode.CONVERSION_FAILED, retryable: false, details }, 'LibreOffice conversion failed');
    return err(createAppError(ErrorCode.CONVERSION_FAILED, `LibreOffice conversion failed: ${details}`, false, details));
  }

  const stem = basename(inputPath, extname(inputPath));
  const pdfPath = join(outDir, `${stem}.pdf`);
  if (!(await deps.fileExists(pdfPath))) {
    await release();
    log.error({ errorCode: ErrorCode.CONVERSION_FAILED, retryable: false, pdfPath }, 'LibreOffice produced no PDF');
    return err(
      createAppError(ErrorCode.CONVERSION_FAILED, `LibreOffice did not produce expected PDF at ${pdfPath}`, false),
    );
  }

  return ok({ path: pdfPath, release });
}
