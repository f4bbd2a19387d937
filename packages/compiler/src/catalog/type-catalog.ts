/**
 * Type Catalog
 * Maps logical field types onto every target's type system and applies the
 * nullability convention of that system. Generators never wrap types themselves.
 */

import { UnsupportedTypeError, type SchemaLocation, type TargetName } from '@polyschema/shared';
import type { ListElementType, LogicalType, ScalarTypeName } from '../ir/types.js';
import { formatLogicalType } from './logical-type.js';

export const STORAGE_DIALECTS = ['sqlite', 'postgresql'] as const;

export type StorageDialect = (typeof STORAGE_DIALECTS)[number];

export type TypeSystemId =
  | 'record'
  | 'interface'
  | 'interface-validation'
  | 'extraction'
  | `storage:${StorageDialect}`;

export interface TypeSystem {
  id: TypeSystemId;
  target: TargetName;
  /** Canonical non-nullable expression per scalar; null when the system has none */
  scalars: Record<ScalarTypeName, string | null>;
  /** Canonical non-nullable expression for `list[T]`; null when lists must be stated per field */
  list: (element: ListElementType) => string | null;
  wrapNullable: (expression: string) => string;
  /** Returns a rejection reason for an override expression, or null when it is acceptable */
  checkOverride?: (expression: string) => string | null;
}

/**
 * Minimal view of a field needed for type mapping
 */
export interface TypedField {
  name: string;
  type: LogicalType;
  nullable: boolean;
}

export interface MapTypeOptions {
  /** Explicit per-target type expression; used verbatim, never wrapped */
  override?: string;
  schema?: string;
}

// =============================================================================
// TYPESCRIPT
// =============================================================================

const TS_SCALARS: Record<ScalarTypeName, string> = {
  string: 'string',
  integer: 'number',
  float: 'number',
  boolean: 'boolean',
  datetime: 'Date',
  json: 'Record<string, unknown>',
};

const tsList = (element: ListElementType): string => `${TS_SCALARS[element]}[]`;
const tsNullable = (expression: string): string => `${expression} | null`;

// =============================================================================
// ZOD
// =============================================================================

const ZOD_SCALARS: Record<ScalarTypeName, string> = {
  string: 'z.string()',
  integer: 'z.number().int()',
  float: 'z.number()',
  boolean: 'z.boolean()',
  datetime: 'z.date()',
  json: 'z.record(z.string(), z.unknown())',
};

// Extracted values arrive as JSON text, so datetimes are coerced from strings
const EXTRACTION_SCALARS: Record<ScalarTypeName, string> = {
  ...ZOD_SCALARS,
  datetime: 'z.coerce.date()',
};

const zodNullable = (expression: string): string => `${expression}.nullable()`;

// =============================================================================
// PRISMA
// =============================================================================

const PRISMA_SCALAR_TYPES = ['String', 'Int', 'BigInt', 'Float', 'Decimal', 'Boolean', 'DateTime', 'Json', 'Bytes'];

const PRISMA_TYPE_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)(\[\]|\?)?$/;

const PRISMA_SCALARS: Record<StorageDialect, Record<ScalarTypeName, string>> = {
  sqlite: {
    string: 'String',
    integer: 'Int',
    float: 'Float',
    boolean: 'Boolean',
    datetime: 'DateTime',
    // No native JSON column: stored as opaque text
    json: 'String',
  },
  postgresql: {
    string: 'String',
    integer: 'Int',
    float: 'Float',
    boolean: 'Boolean',
    datetime: 'DateTime',
    json: 'Json',
  },
};

function checkPrismaOverride(dialect: StorageDialect, expression: string): string | null {
  const match = expression.trim().match(PRISMA_TYPE_PATTERN);
  const base = match?.[1];
  if (!base) {
    return 'not a storage type expression (expected e.g. "String", "Int?", "Tag[]")';
  }

  const modifier = match?.[2];
  if (dialect === 'sqlite') {
    if (base === 'Json') {
      return 'the sqlite dialect has no native JSON column';
    }
    if (modifier === '[]' && PRISMA_SCALAR_TYPES.includes(base)) {
      return 'the sqlite dialect has no scalar list columns';
    }
  }

  return null;
}

function storageSystem(dialect: StorageDialect): TypeSystem {
  return {
    id: `storage:${dialect}`,
    target: 'storage',
    scalars: PRISMA_SCALARS[dialect],
    // Array and relation semantics are dialect-specific and must be stated per field
    list: () => null,
    wrapNullable: (expression) => `${expression}?`,
    checkOverride: (expression) => checkPrismaOverride(dialect, expression),
  };
}

// =============================================================================
// CATALOG
// =============================================================================

const TYPE_SYSTEMS: Record<TypeSystemId, TypeSystem> = {
  record: {
    id: 'record',
    target: 'record',
    scalars: TS_SCALARS,
    list: tsList,
    wrapNullable: tsNullable,
  },
  interface: {
    id: 'interface',
    target: 'interface',
    scalars: TS_SCALARS,
    list: tsList,
    wrapNullable: tsNullable,
  },
  'interface-validation': {
    id: 'interface-validation',
    target: 'interface',
    scalars: ZOD_SCALARS,
    list: (element) => `z.array(${ZOD_SCALARS[element]})`,
    wrapNullable: zodNullable,
  },
  extraction: {
    id: 'extraction',
    target: 'extraction',
    scalars: EXTRACTION_SCALARS,
    list: (element) => `z.array(${EXTRACTION_SCALARS[element]})`,
    wrapNullable: zodNullable,
  },
  'storage:sqlite': storageSystem('sqlite'),
  'storage:postgresql': storageSystem('postgresql'),
};

export function storageTypeSystemId(dialect: StorageDialect): TypeSystemId {
  return `storage:${dialect}`;
}

/**
 * Map a field to its type expression in one type system.
 *
 * The canonical expression is wrapped in the system's nullable convention when
 * the field is nullable. An override expression is returned as written after
 * the system has had a chance to reject it.
 */
export function mapType(field: TypedField, systemId: TypeSystemId, options: MapTypeOptions = {}): string {
  const system = TYPE_SYSTEMS[systemId];
  const location: SchemaLocation = { schema: options.schema, field: field.name, target: system.id };

  if (options.override !== undefined) {
    const rejection = system.checkOverride?.(options.override) ?? null;
    if (rejection) {
      throw new UnsupportedTypeError(options.override, rejection, location);
    }
    return options.override.trim();
  }

  const canonical =
    field.type.kind === 'scalar' ? system.scalars[field.type.name] : system.list(field.type.element);

  if (canonical === null) {
    throw new UnsupportedTypeError(
      formatLogicalType(field.type),
      field.type.kind === 'list'
        ? `${system.id} has no universal list representation; declare an explicit ${system.target} type override`
        : `${system.id} cannot represent this type`,
      location
    );
  }

  return field.nullable ? system.wrapNullable(canonical) : canonical;
}
