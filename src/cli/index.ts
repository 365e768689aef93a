import { runOcr, type OcrServiceDeps } from '../services/ocr/index.js';
import { parseCliArgs, USAGE } from './args.js';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/** Runs one OCR job from command-line arguments and returns the process exit code. */
export async function runCli(
  argv: string[],
  io: CliIO = consoleIO,
  deps: OcrServiceDeps = {},
): Promise<number> {
  const args = parseCliArgs(argv);
  if (!args.ok) {
    io.stderr(`Error: ${args.error.message}`);
    return 1;
  }

  if (args.value.help) {
    io.stdout(USAGE.trimEnd());
    return 0;
  }

  const result = await runOcr(
    {
      inputPath: args.value.pdf,
      model: args.value.model,
      includeImages: args.value.includeImages,
      imageMode: args.value.images,
      outputPath: args.value.output,
    },
    deps,
  );

  if (!result.ok) {
    io.stderr(`Error: ${result.error.message}`);
    return 1;
  }

  io.stdout(`OCR markdown written to ${result.value.outputPath}`);
  return 0;
}
