import { readdir, readFile } from 'node:fs/promises';
import { basename, dirname, resolve } from 'pathe';
import { SchemaSourceError } from '../../errors/errors.js';
import { SchemaSourceProvider } from './schema-source-provider.js';

const IMPORT_DIRECTIVE = /^\s*#import\s+(\S+)\s*$/;

/**
 * Reads a schema file and inlines the files referenced through `#import` lines, relative to the
 * importing file. The last path segment may be a `*.graphql` style wildcard. Every file is
 * included once, so import cycles end at the first repetition.
 */
export class SchemaStitcher implements SchemaSourceProvider {
  private readonly rootSchemaPath: string;

  constructor(rootSchemaPath: string) {
    this.rootSchemaPath = resolve(rootSchemaPath);
  }

  async getSchemaString(): Promise<string> {
    return this.gatherSchema(this.rootSchemaPath, new Set<string>());
  }

  private async gatherSchema(path: string, visited: Set<string>): Promise<string> {
    if (visited.has(path)) {
      return '';
    }
    visited.add(path);

    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (e) {
      throw new SchemaSourceError(`The schema file "${path}" could not be read.`, e);
    }

    const lines: string[] = [];
    for (const line of content.split(/\r?\n/)) {
      const match = IMPORT_DIRECTIVE.exec(line);
      if (!match) {
        lines.push(line);
        continue;
      }
      for (const importPath of await this.expandImport(dirname(path), match[1])) {
        const imported = await this.gatherSchema(importPath, visited);
        if (imported.length > 0) {
          lines.push(imported);
        }
      }
    }
    return lines.join('\n');
  }

  private async expandImport(directory: string, importPath: string): Promise<string[]> {
    const target = resolve(directory, importPath);
    const pattern = basename(target);
    if (!pattern.includes('*')) {
      return [target];
    }

    const targetDirectory = dirname(target);
    let entries: string[];
    try {
      entries = await readdir(targetDirectory);
    } catch (e) {
      throw new SchemaSourceError(`The schema directory "${targetDirectory}" could not be read.`, e);
    }
    const matcher = wildcardToRegExp(pattern);
    return entries
      .filter((entry) => matcher.test(entry))
      .sort()
      .map((entry) => resolve(targetDirectory, entry));
  }
}

function wildcardToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '[^/]*');
  return new RegExp(`^${escaped}$`);
}
