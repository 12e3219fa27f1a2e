import { z } from 'zod';
import { ALL_DEBUG_FLAGS, DebugFlag } from '../execution/debug.js';

export const securityConfigSchema = z.object({
  /**
   * Maximum nesting of fields in an operation. 0 disables the check.
   */
  maxQueryDepth: z.number().int().nonnegative().default(0),
  /**
   * Maximum computed cost of an operation. 0 disables the check.
   */
  maxQueryComplexity: z.number().int().nonnegative().default(0),
  disableIntrospection: z.boolean().default(false),
});

export const redisConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().positive().default(6379),
  password: z.string().optional(),
});

export const cacheConfigSchema = z.object({
  enable: z.boolean().default(false),
  key: z.string().min(1).default('strata-schema'),
  store: z.enum(['memory', 'redis']).default('memory'),
  redis: redisConfigSchema.default({}),
});

export const engineConfigSchema = z.object({
  /**
   * Application wide debug switch. Without it, none of the `debug` flags take effect.
   */
  appDebug: z.boolean().default(false),
  debug: z
    .number()
    .int()
    .min(0)
    .max(ALL_DEBUG_FLAGS)
    .default(DebugFlag.IncludeDebugMessage | DebugFlag.IncludeTrace),
  errorHandlers: z.array(z.string().min(1)).default(['extensions', 'report']),
  cache: cacheConfigSchema.default({}),
  security: securityConfigSchema.default({}),
});

export type SecurityConfig = z.infer<typeof securityConfigSchema>;
export type CacheConfig = z.infer<typeof cacheConfigSchema>;
export type RedisConfig = z.infer<typeof redisConfigSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

const booleanString = z
  .string()
  .transform((val) => val === 'true')
  .optional();

const integerString = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .transform((val) => Number.parseInt(val))
  .optional();

export const envVariables = z.object({
  LOG_LEVEL: z.string().default('info'),
  APP_DEBUG: booleanString,
  GRAPHQL_DEBUG: integerString,
  GRAPHQL_ERROR_HANDLERS: z
    .string()
    .transform((val) =>
      val
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0),
    )
    .optional(),
  GRAPHQL_CACHE_ENABLE: booleanString,
  GRAPHQL_CACHE_KEY: z.string().optional(),
  GRAPHQL_CACHE_STORE: z.enum(['memory', 'redis']).optional(),
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: integerString,
  REDIS_PASSWORD: z.string().optional(),
  GRAPHQL_MAX_QUERY_DEPTH: integerString,
  GRAPHQL_MAX_QUERY_COMPLEXITY: integerString,
  GRAPHQL_DISABLE_INTROSPECTION: booleanString,
});

export type EnvVariables = z.infer<typeof envVariables>;
