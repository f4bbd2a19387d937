/**
 * Typed command options, validated from what commander collected
 */

import { z } from 'zod';
import { ConfigurationError, TARGET_NAMES } from '@polyschema/shared';
import { STORAGE_DIALECTS } from '@polyschema/compiler';

export const generateOptionsSchema = z.object({
  schemaDir: z.string().min(1),
  outputDir: z.string().min(1),
  dialect: z.enum(STORAGE_DIALECTS),
  target: z.array(z.enum(TARGET_NAMES)).min(1),
  schema: z.array(z.string().min(1)).optional(),
  validation: z.boolean(),
  force: z.boolean().default(false),
  dryRun: z.boolean().default(false),
});

export type GenerateOptions = z.infer<typeof generateOptionsSchema>;

export const validateOptionsSchema = z.object({
  schemaDir: z.string().min(1),
  outputDir: z.string().min(1),
});

export type ValidateOptions = z.infer<typeof validateOptionsSchema>;

export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid options: ${issues.join('; ')}`);
  }
  return result.data;
}
