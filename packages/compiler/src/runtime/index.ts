/**
 * Runtime support imported by generated record modules
 */

import { mergeByName } from './merge.js';

export { mergeByName };

export type FieldDefaultSpec =
  | { kind: 'literal'; value: string | number | boolean }
  | { kind: 'generated'; strategy: 'unique-id' | 'uuid' | 'current-timestamp' };

/**
 * One field of a generated record
 */
export interface FieldSpec {
  name: string;
  typeAnnotation: string;
  description: string;
  nullable: boolean;
  required: boolean;
  index?: boolean;
  unique?: boolean;
  primaryKey?: boolean;
  /** Excluded from extraction */
  internal?: boolean;
  foreignKey?: string;
  default?: FieldDefaultSpec;
  searchCategory?: string;
  searchKeywords?: readonly string[];
}

/**
 * Combine a parent's field list with a child's own fields.
 * Child fields replace same-named parent fields in place.
 */
export function mergeFieldSpecs(parent: readonly FieldSpec[], own: readonly FieldSpec[]): readonly FieldSpec[] {
  return mergeByName(parent, own);
}
