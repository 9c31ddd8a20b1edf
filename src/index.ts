#!/usr/bin/env node
import 'dotenv/config';
import { createProgram } from './cli/index.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: errorMessage(error) });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  process.exit(1);
});

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error('Failed', { error: errorMessage(error) });
  process.exitCode = 1;
});
