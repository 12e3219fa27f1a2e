import {
  ASTVisitor,
  DirectiveNode,
  FieldNode,
  getNamedType,
  GraphQLError,
  GraphQLField,
  GraphQLNamedType,
  GraphQLSchema,
  getVariableValues,
  isInterfaceType,
  isObjectType,
  Kind,
  SelectionSetNode,
  ValidationContext,
  ValidationRule,
  ValueNode,
  FragmentDefinitionNode,
} from 'graphql';

export const COST_DIRECTIVE = 'cost';
export const WEIGHT_ARGUMENT = 'weight';
export const DEFAULT_FIELD_COST = 1;

export function maxQueryComplexityErrorMessage(maxComplexity: number, complexity: number): string {
  return `Max query complexity should be ${maxComplexity} but got ${complexity}.`;
}

export type VariableValues = Readonly<Record<string, unknown>>;

interface ComplexityContext {
  schema: GraphQLSchema;
  getFragment: (name: string) => FragmentDefinitionNode | null | undefined;
  variables: VariableValues;
}

function resolveBoolean(value: ValueNode, variables: VariableValues): boolean | undefined {
  if (value.kind === Kind.BOOLEAN) {
    return value.value;
  }
  if (value.kind === Kind.VARIABLE) {
    const variable = variables[value.name.value];
    return typeof variable === 'boolean' ? variable : undefined;
  }
  return undefined;
}

/**
 * Selections skipped through `@skip(if: true)` or `@include(if: false)` cost nothing. Conditions
 * that cannot be resolved count as included.
 */
function isExcluded(directives: ReadonlyArray<DirectiveNode> | undefined, variables: VariableValues): boolean {
  for (const directive of directives ?? []) {
    const condition = directive.arguments?.find((argument) => argument.name.value === 'if');
    if (!condition) {
      continue;
    }
    const value = resolveBoolean(condition.value, variables);
    if (directive.name.value === 'skip' && value === true) {
      return true;
    }
    if (directive.name.value === 'include' && value === false) {
      return true;
    }
  }
  return false;
}

/**
 * The weight of a field is the `weight` argument of a `@cost` directive on its definition.
 */
export function fieldCost(field: GraphQLField<unknown, unknown> | undefined): number {
  const directive = field?.astNode?.directives?.find((candidate) => candidate.name.value === COST_DIRECTIVE);
  const weight = directive?.arguments?.find((argument) => argument.name.value === WEIGHT_ARGUMENT)?.value;
  if (weight?.kind === Kind.INT) {
    return Number.parseInt(weight.value, 10);
  }
  return DEFAULT_FIELD_COST;
}

function fieldDefinition(
  parentType: GraphQLNamedType | undefined,
  node: FieldNode,
): GraphQLField<unknown, unknown> | undefined {
  if (parentType && (isObjectType(parentType) || isInterfaceType(parentType))) {
    return parentType.getFields()[node.name.value];
  }
  return undefined;
}

export function selectionSetComplexity(
  selectionSet: SelectionSetNode,
  parentType: GraphQLNamedType | undefined,
  ctx: ComplexityContext,
  visitedFragments: ReadonlySet<string> = new Set(),
): number {
  let complexity = 0;
  for (const selection of selectionSet.selections) {
    if (isExcluded(selection.directives, ctx.variables)) {
      continue;
    }
    switch (selection.kind) {
      case Kind.FIELD: {
        const field = fieldDefinition(parentType, selection);
        const childComplexity = selection.selectionSet
          ? selectionSetComplexity(
              selection.selectionSet,
              field ? getNamedType(field.type) : undefined,
              ctx,
              visitedFragments,
            )
          : 0;
        complexity += fieldCost(field) + childComplexity;
        break;
      }
      case Kind.INLINE_FRAGMENT: {
        const typeCondition = selection.typeCondition
          ? ctx.schema.getType(selection.typeCondition.name.value) ?? undefined
          : parentType;
        complexity += selectionSetComplexity(selection.selectionSet, typeCondition, ctx, visitedFragments);
        break;
      }
      case Kind.FRAGMENT_SPREAD: {
        const name = selection.name.value;
        if (visitedFragments.has(name)) {
          break;
        }
        const fragment = ctx.getFragment(name);
        if (fragment) {
          const typeCondition = ctx.schema.getType(fragment.typeCondition.name.value) ?? undefined;
          const visited = new Set(visitedFragments).add(name);
          complexity += selectionSetComplexity(fragment.selectionSet, typeCondition, ctx, visited);
        }
        break;
      }
    }
  }
  return complexity;
}

/**
 * Rejects operations whose computed cost exceeds the given maximum. Every field costs its `@cost`
 * weight, or 1, plus the cost of its selection set. A maximum of 0 disables the check.
 */
export function createQueryComplexityRule(maxComplexity: number, variables: VariableValues = {}): ValidationRule {
  return function QueryComplexity(context: ValidationContext): ASTVisitor {
    if (maxComplexity <= 0) {
      return {};
    }
    return {
      OperationDefinition(node) {
        const schema = context.getSchema();
        const rootType = schema.getRootType(node.operation) ?? undefined;
        // Invalid variable values are reported by the execution, the raw values are used until then.
        const { coerced } = getVariableValues(schema, node.variableDefinitions ?? [], variables);
        const complexity = selectionSetComplexity(node.selectionSet, rootType, {
          schema,
          getFragment: (name) => context.getFragment(name),
          variables: coerced ?? variables,
        });
        if (complexity > maxComplexity) {
          context.reportError(
            new GraphQLError(maxQueryComplexityErrorMessage(maxComplexity, complexity), { nodes: node }),
          );
        }
      },
    };
  };
}
