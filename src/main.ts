#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './cli/index.js';
import { logger } from './infrastructure/logger.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  logger.fatal({ err: error instanceof Error ? error.message : String(error) }, 'Unhandled error');
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
