/**
 * Intermediate representation produced by the schema parser and consumed by
 * the inheritance resolver and every generator.
 */

import type { TargetName } from '@polyschema/shared';

export type { TargetName };

// =============================================================================
// LOGICAL TYPES
// =============================================================================

export const SCALAR_TYPES = ['string', 'integer', 'float', 'boolean', 'datetime', 'json'] as const;
export type ScalarTypeName = (typeof SCALAR_TYPES)[number];

/** Element types allowed inside `list[T]` */
export const LIST_ELEMENT_TYPES = ['string', 'integer', 'float', 'boolean', 'datetime'] as const;
export type ListElementType = (typeof LIST_ELEMENT_TYPES)[number];

export type LogicalType =
  | { kind: 'scalar'; name: ScalarTypeName }
  | { kind: 'list'; element: ListElementType };

// =============================================================================
// DEFAULTS
// =============================================================================

export type GenerationStrategy = 'unique-id' | 'uuid' | 'current-timestamp';

export type DefaultToken =
  | { kind: 'literal'; value: string | number | boolean }
  | { kind: 'generated'; strategy: GenerationStrategy };

// =============================================================================
// PER-TARGET OVERRIDES
// =============================================================================

interface BaseOverride {
  /** Field name to use in this target's output */
  name?: string;
  /** Target-specific type expression, used verbatim */
  type?: string;
  /** Omit the field from this target (false forces inclusion) */
  skip?: boolean;
}

export interface RecordOverride extends BaseOverride {
  default?: DefaultToken;
}

export interface StorageOverride extends BaseOverride {
  default?: DefaultToken;
}

export interface InterfaceOverride extends BaseOverride {
  /** Runtime-validation expression replacing the catalog's Zod mapping */
  validationType?: string;
}

export interface ExtractionOverride extends BaseOverride {
  validators?: string[];
  /** Keep the field required in the extraction model */
  required?: boolean;
}

export interface TargetOverrides {
  record?: RecordOverride;
  storage?: StorageOverride;
  interface?: InterfaceOverride;
  extraction?: ExtractionOverride;
}

// =============================================================================
// FIELDS & SCHEMAS
// =============================================================================

export interface SearchMetadata {
  category?: string;
  keywords?: string[];
}

export interface FieldDefinition {
  name: string;
  type: LogicalType;
  description: string;
  nullable: boolean;
  required: boolean;
  index: boolean;
  unique: boolean;
  primaryKey: boolean;
  /** Internal fields are left out of extraction */
  internal: boolean;
  foreignKey?: string;
  default?: DefaultToken;
  search?: SearchMetadata;
  overrides: TargetOverrides;
}

/**
 * A field that exists only in the extraction model
 */
export interface ExtractionField {
  name: string;
  type: LogicalType;
  description: string;
  nullable: boolean;
  required: boolean;
  overrides: Pick<TargetOverrides, 'extraction'>;
}

export interface SchemaDefinition {
  name: string;
  description: string;
  extends?: string;
  fields: readonly FieldDefinition[];
  extractionFields: readonly ExtractionField[];
  /** Source file the schema was parsed from, used in headers and errors */
  sourcePath: string;
}

/**
 * Fetches a named parent schema
 */
export type SchemaLoader = (name: string) => SchemaDefinition;
