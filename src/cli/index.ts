#!/usr/bin/env node

import * as dotenv from 'dotenv';
import pc from 'picocolors';
import { loadConfigFromEnv } from '../config/config.js';
import { createLogger } from '../utils/logger.js';
import createProgram from './commands/index.js';

dotenv.config();

try {
  const env = loadConfigFromEnv(process.env);
  const program = createProgram({ env, logger: createLogger({ level: env.logLevel, pretty: process.stdout.isTTY }) });
  await program.parseAsync(process.argv);
} catch (e) {
  console.log('');
  console.error(e);
  console.log(pc.red('The command failed. Run it with LOG_LEVEL=debug for more details.'));
  process.exitCode = 1;
}
