/**
 * Zod description of a schema document as written in YAML
 */

import { z } from 'zod';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const identifier = z.string().regex(IDENTIFIER_PATTERN, 'must be an identifier (letters, digits, underscore)');

/** Literal default, generation token such as `now()`, or null for "no default" */
const rawDefault = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const baseOverride = {
  name: identifier.optional(),
  type: z.string().min(1).optional(),
  skip: z.boolean().optional(),
};

const rawRecordOverride = z
  .object({
    ...baseOverride,
    default: rawDefault.optional(),
  })
  .strict();

const rawStorageOverride = z
  .object({
    ...baseOverride,
    default: rawDefault.optional(),
  })
  .strict();

const rawInterfaceOverride = z
  .object({
    ...baseOverride,
    validation_type: z.string().min(1).optional(),
  })
  .strict();

const rawExtractionOverride = z
  .object({
    ...baseOverride,
    validators: z
      .union([z.string(), z.array(z.string())])
      .transform((value) => (typeof value === 'string' ? [value] : value))
      .optional(),
    required: z.boolean().optional(),
  })
  .strict();

const rawOverrides = z
  .object({
    record: rawRecordOverride.optional(),
    storage: rawStorageOverride.optional(),
    interface: rawInterfaceOverride.optional(),
    extraction: rawExtractionOverride.optional(),
  })
  .strict();

const rawSearch = z
  .object({
    category: z.string().optional(),
    keywords: z.array(z.string()).optional(),
  })
  .strict();

export const rawFieldSchema = z
  .object({
    name: identifier,
    type: z.string().min(1),
    description: z.string().default(''),
    nullable: z.boolean().optional(),
    required: z.boolean().default(false),
    index: z.boolean().default(false),
    unique: z.boolean().default(false),
    primary_key: z.boolean().default(false),
    internal: z.boolean().default(false),
    foreign_key: z.string().min(1).optional(),
    default: rawDefault.optional(),
    search: rawSearch.optional(),
    overrides: rawOverrides.default({}),
  })
  .strict();

export const rawExtractionFieldSchema = z
  .object({
    name: identifier,
    type: z.string().min(1),
    description: z.string().default(''),
    nullable: z.boolean().optional(),
    required: z.boolean().default(false),
    overrides: z
      .object({
        extraction: rawExtractionOverride.optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export const rawDocumentSchema = z.object({
  schema: z.object({
    name: identifier,
    description: z.string(),
    extends: identifier.optional(),
  }),
  // Entries are validated one at a time so errors can name the field
  fields: z.array(z.unknown()).min(1, 'must list at least one field'),
  extraction_fields: z.array(z.unknown()).optional(),
});

export type RawDefault = z.infer<typeof rawDefault>;
export type RawField = z.infer<typeof rawFieldSchema>;
export type RawExtractionField = z.infer<typeof rawExtractionFieldSchema>;
