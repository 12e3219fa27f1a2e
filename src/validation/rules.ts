import { ASTVisitor, NoSchemaIntrospectionCustomRule, specifiedRules, ValidationRule } from 'graphql';
import { SecurityConfig } from '../config/config.schema.js';
import { createQueryComplexityRule, VariableValues } from './query-complexity.js';
import { createQueryDepthRule } from './query-depth.js';

export const QUERY_COMPLEXITY_RULE = 'QueryComplexity';
export const QUERY_DEPTH_RULE = 'QueryDepth';
export const DISABLE_INTROSPECTION_RULE = 'DisableIntrospection';

export type ValidationRuleMap = ReadonlyMap<string, ValidationRule>;

export interface BuildValidationRulesOptions {
  /**
   * Variable values of the request, used to resolve `@skip` and `@include` conditions when
   * computing the query complexity.
   */
  variables?: VariableValues;
  /**
   * Additional rules keyed by name. A rule with the name of a baseline or configured rule replaces it.
   */
  customRules?: Readonly<Record<string, ValidationRule>>;
}

function AllowIntrospection(): ASTVisitor {
  return {};
}

export function createDisableIntrospectionRule(disabled: boolean): ValidationRule {
  return disabled ? NoSchemaIntrospectionCustomRule : AllowIntrospection;
}

/**
 * The validation rules graphql-js applies by default, keyed by rule name.
 */
export function defaultValidationRules(): Map<string, ValidationRule> {
  return new Map(specifiedRules.map((rule) => [rule.name, rule]));
}

export function buildValidationRuleMap(
  security: SecurityConfig,
  options: BuildValidationRulesOptions = {},
): ValidationRuleMap {
  const rules = defaultValidationRules();
  rules.set(QUERY_COMPLEXITY_RULE, createQueryComplexityRule(security.maxQueryComplexity, options.variables));
  rules.set(QUERY_DEPTH_RULE, createQueryDepthRule(security.maxQueryDepth));
  rules.set(DISABLE_INTROSPECTION_RULE, createDisableIntrospectionRule(security.disableIntrospection));
  for (const [name, rule] of Object.entries(options.customRules ?? {})) {
    rules.set(name, rule);
  }
  return rules;
}

export function buildValidationRules(
  security: SecurityConfig,
  options: BuildValidationRulesOptions = {},
): ValidationRule[] {
  return [...buildValidationRuleMap(security, options).values()];
}
