/**
 * Logical type spelling: `string`, `integer`, ..., `list[string]`
 */

import {
  LIST_ELEMENT_TYPES,
  SCALAR_TYPES,
  type ListElementType,
  type LogicalType,
  type ScalarTypeName,
} from '../ir/types.js';

const LIST_PATTERN = /^list\[\s*([a-z]+)\s*\]$/;

function isScalarTypeName(value: string): value is ScalarTypeName {
  return (SCALAR_TYPES as readonly string[]).includes(value);
}

function isListElementType(value: string): value is ListElementType {
  return (LIST_ELEMENT_TYPES as readonly string[]).includes(value);
}

/**
 * Parse a logical type name; returns null when it is not in the catalog
 */
export function parseLogicalType(text: string): LogicalType | null {
  const normalized = text.trim();

  if (isScalarTypeName(normalized)) {
    return { kind: 'scalar', name: normalized };
  }

  const listMatch = normalized.match(LIST_PATTERN);
  if (listMatch?.[1] && isListElementType(listMatch[1])) {
    return { kind: 'list', element: listMatch[1] };
  }

  return null;
}

export function formatLogicalType(type: LogicalType): string {
  return type.kind === 'scalar' ? type.name : `list[${type.element}]`;
}

/** Every spelling the parser accepts, for error messages */
export function supportedLogicalTypes(): string[] {
  return [...SCALAR_TYPES, ...LIST_ELEMENT_TYPES.map((element) => `list[${element}]`)];
}
