/**
 * Zod validation schemas for CLI configuration
 */

import { ConfigValidationError, partialTierCacheConfigSchema, tierCacheConfigSchema } from '@tiercache/core';
import { z } from 'zod';

import type { CliConfig, PartialCliConfig } from './schema.js';

/**
 * Request timeout schema (1ms - 10 minutes)
 */
const timeoutSchema = z.number().int().min(1).max(600000);

/**
 * Complete CLI configuration schema
 */
export const cliConfigSchema = tierCacheConfigSchema.extend({
  timeoutMs: timeoutSchema,
});

/**
 * Partial CLI configuration schema (for config files and env)
 */
export const partialCliConfigSchema = partialTierCacheConfigSchema.extend({
  timeoutMs: timeoutSchema.optional(),
});

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete CLI configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateCliConfig(config: unknown): CliConfig {
  const result = cliConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial CLI configuration
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialCliConfig(config: unknown): PartialCliConfig {
  const result = partialCliConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

export { ConfigValidationError };
