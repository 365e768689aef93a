import { parseArgs } from 'node:util';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import { cliOptionsSchema, type CliOptions } from '../domain/schemas.js';

export const USAGE = `Usage: pdf-ocr-markdown [input] [options]

Run Mistral OCR on a PDF, image, or office document and write the text as Markdown.

Options:
  --pdf <path>          Path to the file to process (default: ../AXP2101_no_watermark.pdf)
  --model <name>        Mistral OCR model name (default: mistral-ocr-latest)
  --include-images      Include extracted images (base64) in the response
  --images <mode>       none | separate (save to <output>_images/) | inline (embed as data URIs)
                        | zip (bundle markdown and images into <output>.zip)
  --output <path>       Where to write the markdown output (default: ocr_output.md)
  -h, --help            Show this help
`;

function readArgv(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      pdf: { type: 'string' },
      model: { type: 'string' },
      'include-images': { type: 'boolean' },
      images: { type: 'string' },
      output: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

export function parseCliArgs(argv: string[]): Result<CliOptions, AppError> {
  let parsed: ReturnType<typeof readArgv>;
  try {
    parsed = readArgv(argv);
  } catch (cause) {
    return err(createAppError(ErrorCode.INVALID_ARGUMENTS, describeCause(cause), false));
  }

  const { values, positionals } = parsed;
  if (positionals.length > 1) {
    return err(
      createAppError(ErrorCode.INVALID_ARGUMENTS, `Expected at most one input path, got ${positionals.length}`, false),
    );
  }

  const result = cliOptionsSchema.safeParse({
    pdf: positionals[0] ?? values.pdf,
    model: values.model,
    includeImages: values['include-images'],
    images: values.images,
    output: values.output,
    help: values.help,
  });

  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(createAppError(ErrorCode.INVALID_ARGUMENTS, `Invalid arguments: ${details}`, false));
  }

  return ok(result.data);
}
