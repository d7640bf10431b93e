/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import { createDefaultConfig } from './defaults.js';
import type { PartialTierCacheConfig, TierCacheConfig } from './schema.js';

/**
 * Byte budget schema (non-negative integer)
 */
const byteBudgetSchema = z.number().int().nonnegative();

/**
 * Storage location schema
 */
export const storageLocationSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('default') }),
  z.object({ kind: z.literal('shared'), identifier: z.string().trim().min(1) }),
  z.object({ kind: z.literal('custom'), path: z.string().min(1) }),
]);

/**
 * Complete configuration schema
 */
export const tierCacheConfigSchema = z.object({
  storage: storageLocationSchema,
  memoryLimitBytes: byteBudgetSchema,
  diskLimitBytes: byteBudgetSchema,
  ttlMs: z.number().nonnegative(),
  defaultHeaders: z.record(z.string(), z.string()),
});

/**
 * Partial configuration schema (for caller or file input)
 */
export const partialTierCacheConfigSchema = tierCacheConfigSchema.partial();

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): TierCacheConfig {
  const result = tierCacheConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialTierCacheConfig {
  const result = partialTierCacheConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Merge a partial configuration over the defaults and validate the result
 */
export function resolveConfig(overrides: PartialTierCacheConfig = {}): TierCacheConfig {
  const defaults = createDefaultConfig();
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return validateConfig({
    ...defaults,
    ...defined,
    defaultHeaders: { ...defaults.defaultHeaders, ...overrides.defaultHeaders },
  });
}
