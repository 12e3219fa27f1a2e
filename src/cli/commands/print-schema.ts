import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { printSchemaWithDirectives } from '@graphql-tools/utils';
import logSymbols from 'log-symbols';
import { resolve } from 'pathe';
import pc from 'picocolors';
import { BaseCommandOptions } from '../types.js';
import { createSchemaEngine, resolveSchemaFile } from './utils.js';

export default (opts: BaseCommandOptions) => {
  const command = new Command('print-schema');
  command.description(
    'Builds the executable schema from the schema file, including its imports, and prints it as SDL.',
  );
  command.requiredOption('--schema <path-to-schema>', 'The path of the root schema file.');
  command.option('-o, --out <path-to-out-file>', 'The path where the printed schema should be written.');

  command.action(async (options: { schema: string; out?: string }) => {
    const engine = createSchemaEngine(opts, resolveSchemaFile(command, options.schema));
    const sdl = printSchemaWithDirectives(await engine.getExecutableSchema());

    if (options.out) {
      await writeFile(resolve(process.cwd(), options.out), sdl);
      console.log(logSymbols.success + pc.green(` Schema written to ${options.out}.`));
      return;
    }

    console.log(sdl);
  });

  return command;
};
