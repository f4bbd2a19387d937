/**
 * Schema Parser
 * Reads one YAML schema description into the intermediate representation.
 * Inheritance is recorded, never resolved, here.
 */

import { parse as parseYaml, YAMLParseError } from 'yaml';
import type { ZodError } from 'zod';
import { createChildLogger, ParseError, type SchemaLocation } from '@polyschema/shared';
import type {
  DefaultToken,
  ExtractionField,
  ExtractionOverride,
  FieldDefinition,
  LogicalType,
  SchemaDefinition,
  TargetOverrides,
} from '../ir/types.js';
import { parseLogicalType, supportedLogicalTypes } from '../catalog/logical-type.js';
import {
  rawDocumentSchema,
  rawExtractionFieldSchema,
  rawFieldSchema,
  type RawDefault,
  type RawExtractionField,
  type RawField,
} from './raw-schema.js';

const logger = createChildLogger({ component: 'SchemaParser' });

export const INLINE_SOURCE = '<inline>';

export interface ParseOptions {
  /** Where the source text came from; used in headers and error messages */
  sourcePath?: string;
}

const GENERATION_TOKENS: Record<string, DefaultToken> = {
  'cuid()': { kind: 'generated', strategy: 'unique-id' },
  'uuid()': { kind: 'generated', strategy: 'uuid' },
  'now()': { kind: 'generated', strategy: 'current-timestamp' },
};

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function toDefaultToken(value: RawDefault | undefined): DefaultToken | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    const token = GENERATION_TOKENS[value.trim()];
    if (token) {
      return token;
    }
  }
  return { kind: 'literal', value };
}

function readType(type: string, location: SchemaLocation): LogicalType {
  const logicalType = parseLogicalType(type);
  if (!logicalType) {
    throw new ParseError(
      `Unsupported type '${type}'. Supported types: ${supportedLogicalTypes().join(', ')}`,
      location
    );
  }
  return logicalType;
}

/**
 * `required` forces non-nullable; asking for both is contradictory
 */
function readNullable(raw: { nullable?: boolean; required: boolean }, location: SchemaLocation): boolean {
  if (raw.required) {
    if (raw.nullable === true) {
      throw new ParseError('A required field cannot be nullable', location);
    }
    return false;
  }
  return raw.nullable ?? true;
}

function fieldNameOf(entry: unknown): string | undefined {
  if (typeof entry === 'object' && entry !== null && 'name' in entry && typeof entry.name === 'string') {
    return entry.name;
  }
  return undefined;
}

function toExtractionOverride(raw: RawField['overrides']['extraction']): ExtractionOverride | undefined {
  if (!raw) {
    return undefined;
  }
  return {
    name: raw.name,
    type: raw.type,
    skip: raw.skip,
    validators: raw.validators,
    required: raw.required,
  };
}

function toOverrides(raw: RawField['overrides']): TargetOverrides {
  const overrides: TargetOverrides = {};

  if (raw.record) {
    overrides.record = {
      name: raw.record.name,
      type: raw.record.type,
      skip: raw.record.skip,
      default: toDefaultToken(raw.record.default),
    };
  }
  if (raw.storage) {
    overrides.storage = {
      name: raw.storage.name,
      type: raw.storage.type,
      skip: raw.storage.skip,
      default: toDefaultToken(raw.storage.default),
    };
  }
  if (raw.interface) {
    overrides.interface = {
      name: raw.interface.name,
      type: raw.interface.type,
      skip: raw.interface.skip,
      validationType: raw.interface.validation_type,
    };
  }
  const extraction = toExtractionOverride(raw.extraction);
  if (extraction) {
    overrides.extraction = extraction;
  }

  return overrides;
}

function toFieldDefinition(raw: RawField, location: SchemaLocation): FieldDefinition {
  return {
    name: raw.name,
    type: readType(raw.type, location),
    description: raw.description,
    nullable: readNullable(raw, location),
    required: raw.required,
    index: raw.index,
    unique: raw.unique,
    primaryKey: raw.primary_key,
    internal: raw.internal,
    foreignKey: raw.foreign_key,
    default: toDefaultToken(raw.default),
    search: raw.search ? { category: raw.search.category, keywords: raw.search.keywords } : undefined,
    overrides: toOverrides(raw.overrides),
  };
}

function toExtractionField(raw: RawExtractionField, location: SchemaLocation): ExtractionField {
  const extraction = toExtractionOverride(raw.overrides.extraction);
  return {
    name: raw.name,
    type: readType(raw.type, location),
    description: raw.description,
    nullable: readNullable(raw, location),
    required: raw.required,
    overrides: extraction ? { extraction } : {},
  };
}

function loadDocument(source: string, sourcePath: string): unknown {
  try {
    return parseYaml(source);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ParseError(`Malformed YAML: ${error.message}`, { sourcePath });
    }
    throw error;
  }
}

/**
 * Parse one schema description.
 *
 * @throws ParseError when the description is malformed or incomplete
 */
export function parseSchema(source: string, options: ParseOptions = {}): SchemaDefinition {
  const sourcePath = options.sourcePath ?? INLINE_SOURCE;
  const document = loadDocument(source, sourcePath);

  if (document === null || document === undefined) {
    throw new ParseError('Schema description is empty', { sourcePath });
  }

  const parsed = rawDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new ParseError(`Invalid schema description: ${formatIssues(parsed.error)}`, {
      schema: fieldNameOf(typeof document === 'object' && 'schema' in document ? document.schema : undefined),
      sourcePath,
    });
  }

  const { schema, fields: rawFields, extraction_fields: rawExtractionFields = [] } = parsed.data;
  const seen = new Set<string>();

  const fields = rawFields.map((entry, position) => {
    const location: SchemaLocation = {
      schema: schema.name,
      field: fieldNameOf(entry) ?? `#${position + 1}`,
      sourcePath,
    };
    const result = rawFieldSchema.safeParse(entry);
    if (!result.success) {
      throw new ParseError(`Invalid field: ${formatIssues(result.error)}`, location);
    }
    if (seen.has(result.data.name)) {
      throw new ParseError(`Duplicate field name '${result.data.name}'`, location);
    }
    seen.add(result.data.name);
    return toFieldDefinition(result.data, location);
  });

  const extractionFields = rawExtractionFields.map((entry, position) => {
    const location: SchemaLocation = {
      schema: schema.name,
      field: fieldNameOf(entry) ?? `extraction_fields#${position + 1}`,
      sourcePath,
    };
    const result = rawExtractionFieldSchema.safeParse(entry);
    if (!result.success) {
      throw new ParseError(`Invalid extraction field: ${formatIssues(result.error)}`, location);
    }
    return toExtractionField(result.data, location);
  });

  logger.debug(
    { schema: schema.name, fieldCount: fields.length, extractionFieldCount: extractionFields.length, sourcePath },
    'Parsed schema'
  );

  return {
    name: schema.name,
    description: schema.description,
    extends: schema.extends,
    fields,
    extractionFields,
    sourcePath,
  };
}
