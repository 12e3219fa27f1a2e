import { EnvConfig } from '../config/config.js';
import { Logger } from '../utils/logger.js';

export interface BaseCommandOptions {
  env: EnvConfig;
  logger: Logger;
}
