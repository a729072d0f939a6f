/**
 * Configuration Validator
 *
 * Zod schemas for:
 * - Source settings documents (only permissions.allow / permissions.deny are checked)
 * - Merger command-line options
 * - Extractor command-line options
 */

import { z } from 'zod';
import {
  DEFAULT_INDENT,
  DEFAULT_SOURCE_PREFIX,
  DEFAULT_SOURCE_SUFFIX,
  type SettingsDocument,
} from './types.js';
import { logger } from '../utils/logger.js';

const PatternListSchema = z.array(z.string(), {
  invalid_type_error: 'Expected an array of permission strings',
});

/**
 * Settings document schema. Unknown keys pass through untouched.
 */
export const SettingsDocumentSchema = z
  .object({
    permissions: z
      .object({
        allow: PatternListSchema.optional(),
        deny: PatternListSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export function isSettingsDocument(data: unknown): data is SettingsDocument {
  return SettingsDocumentSchema.safeParse(data).success;
}

/**
 * Merger options after argument parsing
 */
export const MergeOptionsSchema = z.object({
  files: z.array(z.string()),
  output: z.string().min(1, 'Output path must not be empty').optional(),
  indent: z.coerce
    .number({ invalid_type_error: 'Indent must be a number' })
    .int('Indent must be an integer')
    .nonnegative('Indent must not be negative')
    .default(DEFAULT_INDENT),
  compact: z.boolean().default(false),
  backup: z.boolean().default(true),
  help: z.boolean().default(false),
});

export type MergeOptions = z.infer<typeof MergeOptionsSchema>;

/**
 * Extractor options after argument parsing
 */
export const ExtractOptionsSchema = z.object({
  dir: z.string().min(1).optional(),
  prefix: z.string().default(DEFAULT_SOURCE_PREFIX),
  suffix: z.string().min(1, 'Suffix must not be empty').default(DEFAULT_SOURCE_SUFFIX),
  help: z.boolean().default(false),
});

export type ExtractOptions = z.infer<typeof ExtractOptionsSchema>;

/**
 * Validation result
 */
export interface ValidationResult<T> {
  valid: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Validate data against a Zod schema
 *
 * @param context - Context for error messages (e.g., file path)
 */
export function validateConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, data: result.data };
  }

  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });

  logger.debug('Validator', `Invalid configuration in ${context}`, { errors });

  return { valid: false, errors };
}
