#!/usr/bin/env node

import { env, stderr } from 'node:process';

import { loadConfig } from '@app/config.js';
import type { AppConfig } from '@app/config.js';
import { errorMessage } from '@app/errors.js';
import { createLogger } from '@app/logger.js';
import { runUntilSignalled, startInvoiceService } from '@app/supervisor.js';

let config: AppConfig;
try {
  config = loadConfig(env);
}
catch (error) {
  stderr.write(`Error: ${errorMessage(error)}\n`);
  process.exit(1);
}

const logger = createLogger(config.logLevel);

try {
  const runtime = await startInvoiceService(config, logger);
  await runUntilSignalled(runtime, logger);
  process.exitCode = 0;
}
catch (error) {
  logger.fatal({ err: error }, 'invoice service failed to start');
  process.exitCode = 1;
}
