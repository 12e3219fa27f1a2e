import { DocumentNode } from 'graphql';
import { z } from 'zod';
import { formatZodIssues, InvalidRequestError } from '../errors/errors.js';

export type VariableMap = Record<string, unknown>;

export interface GraphQLRequest<TContext = unknown> {
  query: string | DocumentNode;
  context: TContext;
  variables?: VariableMap | null;
  rootValue?: unknown;
  operationName?: string | null;
}

const variablesSchema = z.record(z.unknown()).nullable();

const requestBodySchema = z.object({
  query: z.string().min(1),
  variables: z.union([variablesSchema, z.string()]).optional(),
  operationName: z.string().nullable().optional(),
});

const batchedRequestBodySchema = z.array(requestBodySchema).min(1);

type RequestBody = z.infer<typeof requestBodySchema>;

function decodeVariables(variables: RequestBody['variables']): VariableMap | null | undefined {
  if (typeof variables !== 'string') {
    return variables;
  }
  if (variables.trim().length === 0) {
    return undefined;
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(variables);
  } catch (e) {
    throw new InvalidRequestError('The variables of the GraphQL request are not valid JSON.', e);
  }
  const result = variablesSchema.safeParse(decoded);
  if (!result.success) {
    throw new InvalidRequestError('The variables of the GraphQL request must be an object.', result.error);
  }
  return result.data;
}

function toRequest<TContext>(body: RequestBody, context: TContext): GraphQLRequest<TContext> {
  return {
    query: body.query,
    context,
    variables: decodeVariables(body.variables),
    operationName: body.operationName,
  };
}

/**
 * Validates the decoded body of an HTTP request. An array body is a batch of requests sharing the context.
 */
export function parseGraphQLRequest<TContext>(
  body: unknown,
  context: TContext,
): GraphQLRequest<TContext> | Array<GraphQLRequest<TContext>> {
  if (Array.isArray(body)) {
    const result = batchedRequestBodySchema.safeParse(body);
    if (!result.success) {
      throw new InvalidRequestError(`Invalid batched GraphQL request: ${formatZodIssues(result.error)}`, result.error);
    }
    return result.data.map((entry) => toRequest(entry, context));
  }

  const result = requestBodySchema.safeParse(body);
  if (!result.success) {
    throw new InvalidRequestError(`Invalid GraphQL request: ${formatZodIssues(result.error)}`, result.error);
  }
  return toRequest(result.data, context);
}
