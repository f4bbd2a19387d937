/**
 * Generator option types
 */

import type { SchemaLoader } from '../ir/types.js';
import type { StorageDialect } from '../catalog/type-catalog.js';

export interface GenerationOptions {
  /** Timestamp written to the header; defaults to now */
  generatedAt?: Date;
}

export type RecordGenerationOptions = GenerationOptions;

export interface StorageGenerationOptions extends GenerationOptions {
  dialect: StorageDialect;
  loader: SchemaLoader;
}

export interface InterfaceGenerationOptions extends GenerationOptions {
  /** Also emit a parallel Zod schema */
  includeValidation?: boolean;
  /** Lets a child interface drop parent members it redeclares */
  loader?: SchemaLoader;
}

export interface ExtractionGenerationOptions extends GenerationOptions {
  loader: SchemaLoader;
}
