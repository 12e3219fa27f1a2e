import { DocumentNode, parse } from 'graphql';
import { mergeTypeDefs } from '@graphql-tools/merge';
import { schemaMergeError, schemaSyntaxError } from '../errors/errors.js';

/**
 * Parses schema definition language into a document. Type extensions are merged into the type
 * definition they extend, so listeners manipulating the document see each type in one place.
 */
export class ASTBuilder {
  build(schemaString: string): DocumentNode {
    let document: DocumentNode;
    try {
      document = parse(schemaString, { noLocation: true });
    } catch (e) {
      throw schemaSyntaxError(e);
    }

    try {
      return mergeTypeDefs(document, {
        useSchemaDefinition: false,
        forceSchemaDefinition: false,
        throwOnConflict: true,
      });
    } catch (e) {
      throw schemaMergeError(e);
    }
  }
}
