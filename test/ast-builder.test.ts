import { describe, expect, test } from 'vitest';
import { isTypeDefinitionNode, Kind } from 'graphql';
import { SchemaBuildError } from '../src/errors/errors.js';
import { ASTBuilder } from '../src/schema/ast-builder.js';

describe('ASTBuilder', () => {
  test('that type extensions are merged into their definition', () => {
    const document = new ASTBuilder().build(`
      type Query { a: String }
      type User { id: ID! }
      extend type Query { b: String }
      extend type User { name: String }
    `);

    const types = document.definitions.filter(isTypeDefinitionNode);
    expect(types.map((type) => type.name.value).sort()).toEqual(['Query', 'User']);
    expect(document.definitions.some((definition) => definition.kind === Kind.OBJECT_TYPE_EXTENSION)).toBe(false);

    const query = types.find((type) => type.name.value === 'Query');
    const fields = query?.kind === Kind.OBJECT_TYPE_DEFINITION ? query.fields ?? [] : [];
    expect(fields.map((field) => field.name.value).sort()).toEqual(['a', 'b']);
  });

  test('that syntax errors are reported as schema build errors', () => {
    let thrown: unknown;
    try {
      new ASTBuilder().build('type Query {');
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(SchemaBuildError);
    if (thrown instanceof SchemaBuildError) {
      expect(thrown.message).toMatch(
        /^The schema has syntax errors and could not be parsed\.\n The reason provided was: Syntax Error/,
      );
      expect(thrown.cause).toBeInstanceOf(Error);
    }
  });

  test('that conflicting type extensions are reported as schema build errors', () => {
    let thrown: unknown;
    try {
      new ASTBuilder().build('type Query { hello: String! }\nextend type Query { hello: Int }');
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(SchemaBuildError);
    if (thrown instanceof SchemaBuildError) {
      expect(thrown.message).toMatch(/^The type extensions of the schema could not be merged: /);
      expect(thrown.cause).toBeInstanceOf(Error);
    }
  });
});
