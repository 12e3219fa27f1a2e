import { Command } from 'commander';
import { BaseCommandOptions } from '../types.js';
import PrintSchema from './print-schema.js';
import ValidateSchema from './validate-schema.js';
import ClearCache from './clear-cache.js';

export const CLI_VERSION = '0.1.0';

export default (opts: BaseCommandOptions) => {
  const program = new Command();
  program.name('strata').version(CLI_VERSION).description('Manage the schema of a Strata GraphQL engine.');

  program.addCommand(PrintSchema(opts));
  program.addCommand(ValidateSchema(opts));
  program.addCommand(ClearCache(opts));

  return program;
};
