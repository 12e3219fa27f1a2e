import {
  ASTVisitor,
  FragmentDefinitionNode,
  GraphQLError,
  Kind,
  SelectionSetNode,
  ValidationContext,
  ValidationRule,
} from 'graphql';

export function maxQueryDepthErrorMessage(maxDepth: number, depth: number): string {
  return `Max query depth should be ${maxDepth} but got ${depth}.`;
}

/**
 * Nesting level of the deepest field that has a selection set, counting top level fields as 0:
 * `{ a { b } }` has a depth of 0, `{ a { b { c } } }` of 1. Leaf fields do not add to the depth.
 * Fragments count at the level they are spread into.
 */
export function selectionSetDepth(
  selectionSet: SelectionSetNode,
  getFragment: (name: string) => FragmentDefinitionNode | null | undefined,
  depth = 0,
  visitedFragments: ReadonlySet<string> = new Set(),
): number {
  let maxDepth = 0;
  for (const selection of selectionSet.selections) {
    switch (selection.kind) {
      case Kind.FIELD: {
        if (selection.selectionSet) {
          maxDepth = Math.max(
            maxDepth,
            depth,
            selectionSetDepth(selection.selectionSet, getFragment, depth + 1, visitedFragments),
          );
        }
        break;
      }
      case Kind.INLINE_FRAGMENT: {
        maxDepth = Math.max(maxDepth, selectionSetDepth(selection.selectionSet, getFragment, depth, visitedFragments));
        break;
      }
      case Kind.FRAGMENT_SPREAD: {
        const name = selection.name.value;
        // Cycles are reported by the NoFragmentCycles rule.
        if (visitedFragments.has(name)) {
          break;
        }
        const fragment = getFragment(name);
        if (fragment) {
          const visited = new Set(visitedFragments).add(name);
          maxDepth = Math.max(maxDepth, selectionSetDepth(fragment.selectionSet, getFragment, depth, visited));
        }
        break;
      }
    }
  }
  return maxDepth;
}

/**
 * Rejects operations nested deeper than the given maximum. A maximum of 0 disables the check.
 */
export function createQueryDepthRule(maxDepth: number): ValidationRule {
  return function QueryDepth(context: ValidationContext): ASTVisitor {
    if (maxDepth <= 0) {
      return {};
    }
    return {
      OperationDefinition(node) {
        const depth = selectionSetDepth(node.selectionSet, (name) => context.getFragment(name));
        if (depth > maxDepth) {
          context.reportError(new GraphQLError(maxQueryDepthErrorMessage(maxDepth, depth), { nodes: node }));
        }
      },
    };
  };
}
