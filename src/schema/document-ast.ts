import {
  DefinitionNode,
  DirectiveDefinitionNode,
  DocumentNode,
  FieldDefinitionNode,
  InputValueDefinitionNode,
  InterfaceTypeDefinitionNode,
  isTypeDefinitionNode,
  Kind,
  ObjectTypeDefinitionNode,
  parse,
  TypeDefinitionNode,
} from 'graphql';
import { SchemaBuildError } from '../errors/errors.js';

type FieldContainerNode = ObjectTypeDefinitionNode | InterfaceTypeDefinitionNode;

function isFieldContainerNode(node: TypeDefinitionNode): node is FieldContainerNode {
  return node.kind === Kind.OBJECT_TYPE_DEFINITION || node.kind === Kind.INTERFACE_TYPE_DEFINITION;
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  for (const [key, nested] of Object.entries(value)) {
    // Locations link every token of the source, they are not part of the document structure.
    if (key !== 'loc') {
      deepFreeze(nested);
    }
  }
  Object.freeze(value);
  return value;
}

/**
 * Mutable view on a schema document. Handed to the `manipulatingAST` listeners, which may add,
 * replace or remove definitions in place. `toDocument` freezes the builder and produces the
 * immutable document the rest of the engine works with.
 */
export class DocumentAST {
  /**
   * Type definitions keyed by type name, in the order they were first defined.
   */
  readonly types = new Map<string, TypeDefinitionNode>();
  readonly directives = new Map<string, DirectiveDefinitionNode>();
  /**
   * Schema definitions and extensions, type extensions without a definition.
   */
  readonly otherDefinitions: DefinitionNode[] = [];

  #frozen = false;

  static fromDocument(document: DocumentNode): DocumentAST {
    const documentAST = new DocumentAST();
    for (const definition of document.definitions) {
      documentAST.addDefinition(definition);
    }
    return documentAST;
  }

  get isFrozen(): boolean {
    return this.#frozen;
  }

  typeDefinition(name: string): TypeDefinitionNode | undefined {
    return this.types.get(name);
  }

  hasType(name: string): boolean {
    return this.types.has(name);
  }

  /**
   * Adds the definition or replaces the existing definition with the same name.
   */
  setTypeDefinition(node: TypeDefinitionNode): this {
    this.assertMutable();
    this.types.set(node.name.value, node);
    return this;
  }

  removeTypeDefinition(name: string): boolean {
    this.assertMutable();
    return this.types.delete(name);
  }

  setDirectiveDefinition(node: DirectiveDefinitionNode): this {
    this.assertMutable();
    this.directives.set(node.name.value, node);
    return this;
  }

  /**
   * Appends a field, given as SDL such as `hello(name: String): String!`, to an object or interface type.
   */
  addFieldDefinition(typeName: string, fieldSDL: string): this {
    this.assertMutable();
    const node = this.types.get(typeName);
    if (!node || !isFieldContainerNode(node)) {
      throw new SchemaBuildError(`Cannot add a field to "${typeName}" because it is not a defined object or interface type.`);
    }
    const field = parseFieldDefinition(fieldSDL);
    const fields = (node.fields ?? []).filter((existing) => existing.name.value !== field.name.value);
    this.types.set(typeName, { ...node, fields: [...fields, field] });
    return this;
  }

  /**
   * Adds an argument, given as SDL such as `first: Int = 10`, to a field of an object or interface type.
   */
  addFieldArgument(typeName: string, fieldName: string, argumentSDL: string): this {
    this.assertMutable();
    const node = this.types.get(typeName);
    if (!node || !isFieldContainerNode(node)) {
      throw new SchemaBuildError(`Cannot add an argument to "${typeName}" because it is not a defined object or interface type.`);
    }
    const field = node.fields?.find((candidate) => candidate.name.value === fieldName);
    if (!field) {
      throw new SchemaBuildError(`Cannot add an argument to "${typeName}.${fieldName}" because the field is not defined.`);
    }
    const argument = parseInputValueDefinition(argumentSDL);
    const args = (field.arguments ?? []).filter((existing) => existing.name.value !== argument.name.value);
    const updatedField: FieldDefinitionNode = { ...field, arguments: [...args, argument] };
    this.types.set(typeName, {
      ...node,
      fields: (node.fields ?? []).map((candidate) => (candidate === field ? updatedField : candidate)),
    });
    return this;
  }

  /**
   * Parses additional SDL and adds every definition it contains.
   */
  extendFromSource(sdl: string): this {
    this.assertMutable();
    for (const definition of parse(sdl, { noLocation: true }).definitions) {
      this.addDefinition(definition);
    }
    return this;
  }

  toDocument(): DocumentNode {
    this.#frozen = true;
    const definitions: DefinitionNode[] = [
      ...this.directives.values(),
      ...this.types.values(),
      ...this.otherDefinitions,
    ];
    const document: DocumentNode = { kind: Kind.DOCUMENT, definitions };
    return deepFreeze(document);
  }

  private addDefinition(definition: DefinitionNode): void {
    if (isTypeDefinitionNode(definition)) {
      this.setTypeDefinition(definition);
      return;
    }
    if (definition.kind === Kind.DIRECTIVE_DEFINITION) {
      this.setDirectiveDefinition(definition);
      return;
    }
    this.otherDefinitions.push(definition);
  }

  private assertMutable(): void {
    if (this.#frozen) {
      throw new SchemaBuildError('The schema document is frozen and can no longer be changed.');
    }
  }
}

function parseFieldDefinition(fieldSDL: string): FieldDefinitionNode {
  const document = parse(`type FieldHolder { ${fieldSDL} }`, { noLocation: true });
  const [definition] = document.definitions;
  if (definition?.kind !== Kind.OBJECT_TYPE_DEFINITION || definition.fields?.length !== 1) {
    throw new SchemaBuildError(`Expected exactly one field definition but received "${fieldSDL}".`);
  }
  return definition.fields[0];
}

function parseInputValueDefinition(argumentSDL: string): InputValueDefinitionNode {
  const document = parse(`type ArgumentHolder { field(${argumentSDL}): String }`, { noLocation: true });
  const [definition] = document.definitions;
  const field = definition?.kind === Kind.OBJECT_TYPE_DEFINITION ? definition.fields?.[0] : undefined;
  if (!field || field.arguments?.length !== 1) {
    throw new SchemaBuildError(`Expected exactly one argument definition but received "${argumentSDL}".`);
  }
  return field.arguments[0];
}
