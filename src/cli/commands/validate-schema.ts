import { Command } from 'commander';
import logSymbols from 'log-symbols';
import pc from 'picocolors';
import { BaseCommandOptions } from '../types.js';
import { createSchemaEngine, resolveSchemaFile } from './utils.js';

export default (opts: BaseCommandOptions) => {
  const command = new Command('validate-schema');
  command.description('Builds the executable schema from the schema file and reports whether it is valid.');
  command.requiredOption('--schema <path-to-schema>', 'The path of the root schema file.');

  command.action(async (options: { schema: string }) => {
    const engine = createSchemaEngine(opts, resolveSchemaFile(command, options.schema));
    try {
      await engine.getExecutableSchema();
    } catch (e) {
      console.log(logSymbols.error + pc.red(' The schema is invalid.'));
      console.log(pc.red(pc.bold(e instanceof Error ? e.message : String(e))));
      process.exitCode = 1;
      return;
    }
    console.log(logSymbols.success + pc.green(' The schema is valid.'));
  });

  return command;
};
