#!/usr/bin/env node
/**
 * surfacewatch — CLI エントリポイント
 */

import { loadConfig } from './config.js';
import { buildProgram } from './cli/program.js';
import { createLogger } from './logger.js';

const config = loadConfig();
try {
  await buildProgram({ config }).parseAsync(process.argv);
} catch (err) {
  createLogger(config.logLevel).error({ err }, 'command failed');
  process.exitCode = 1;
}
