#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { createProgram, formatCliError } from './cli/program.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Command failed');
  console.error(formatCliError(error));
  process.exitCode = 1;
});
