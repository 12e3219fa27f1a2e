import { existsSync } from 'node:fs';
import { Command } from 'commander';
import { resolve } from 'pathe';
import pc from 'picocolors';
import { GraphQLEngine } from '../../engine.js';
import { createEngine } from '../../create-engine.js';
import { SchemaStitcher } from '../../schema/source/schema-stitcher.js';
import { BaseCommandOptions } from '../types.js';

export function resolveSchemaFile(command: Command, schema: string): string {
  const schemaFile = resolve(process.cwd(), schema);
  if (!existsSync(schemaFile)) {
    command.error(
      pc.red(pc.bold(`The schema file '${pc.bold(schema)}' does not exist. Please check the path and try again.`)),
    );
  }
  return schemaFile;
}

/**
 * An engine for the schema file that always builds the schema from source, bypassing the cache.
 */
export function createSchemaEngine(opts: BaseCommandOptions, schemaFile: string): GraphQLEngine {
  return createEngine({
    schema: new SchemaStitcher(schemaFile),
    config: {
      ...opts.env.engine,
      cache: { ...opts.env.engine.cache, enable: false },
    },
    logger: opts.logger,
  });
}
