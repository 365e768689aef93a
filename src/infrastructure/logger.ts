import pino from 'pino';

export const logger = pino(
  {
    name: 'pdf-ocr-markdown',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  // stdout carries the result line only
  pino.destination(2),
);

export function createRunLogger(runId: string, inputPath?: string) {
  return logger.child({
    runId,
    ...(inputPath !== undefined && { inputPath }),
  });
}
