/**
 * Storage Schema Generator
 * Transforms resolved schemas into Prisma models for SQLite and PostgreSQL
 */

import { createChildLogger, logGeneration, UnsupportedTypeError } from '@polyschema/shared';
import type { DefaultToken, FieldDefinition, GenerationStrategy, SchemaDefinition } from '../ir/types.js';
import { mapType, storageTypeSystemId, type StorageDialect } from '../catalog/type-catalog.js';
import { resolveFields } from '../inheritance/resolver.js';
import { renderHeader } from './header.js';
import { commentText } from './naming.js';
import type { StorageGenerationOptions } from './types.js';

const logger = createChildLogger({ component: 'StorageSchemaGenerator' });

export const STORAGE_FILE_NAME = 'schema.prisma';

const UPDATED_AT_NAMES = new Set(['updated_at', 'updatedAt']);

const STRATEGY_FUNCTIONS: Record<GenerationStrategy, string> = {
  'unique-id': 'cuid()',
  uuid: 'uuid()',
  'current-timestamp': 'now()',
};

/**
 * One column line before alignment
 */
interface ColumnDefinition {
  name: string;
  type: string;
  attributes: string[];
}

function renderDefaultAttribute(token: DefaultToken): string {
  if (token.kind === 'generated') {
    return `@default(${STRATEGY_FUNCTIONS[token.strategy]})`;
  }
  if (typeof token.value === 'string') {
    return `@default(${JSON.stringify(token.value)})`;
  }
  return `@default(${String(token.value)})`;
}

/**
 * Identity default for a primary key with none declared
 */
function keyGenerationAttribute(field: FieldDefinition): string {
  if (field.type.kind === 'scalar' && field.type.name === 'integer') {
    return '@default(autoincrement())';
  }
  return `@default(${STRATEGY_FUNCTIONS['unique-id']})`;
}

function buildColumn(field: FieldDefinition, schemaName: string, dialect: StorageDialect): ColumnDefinition {
  const override = field.overrides.storage;
  const name = override?.name ?? field.name;
  const type = mapType(field, storageTypeSystemId(dialect), { override: override?.type, schema: schemaName });
  const defaultToken = override?.default ?? field.default;

  const attributes: string[] = [];

  if (field.primaryKey) {
    attributes.push('@id');
    attributes.push(defaultToken ? renderDefaultAttribute(defaultToken) : keyGenerationAttribute(field));
  } else {
    if (field.unique) {
      attributes.push('@unique');
    }
    if (defaultToken) {
      attributes.push(renderDefaultAttribute(defaultToken));
    }
  }

  if (UPDATED_AT_NAMES.has(name)) {
    attributes.push('@updatedAt');
  }

  return { name, type, attributes };
}

/**
 * Reject two fields that land on the same column name
 */
function assertDistinctColumns(
  schema: SchemaDefinition,
  fields: readonly FieldDefinition[],
  columns: readonly ColumnDefinition[],
  dialect: StorageDialect
): void {
  const claimedBy = new Map<string, string>();

  columns.forEach((column, index) => {
    const fieldName = fields[index]?.name ?? column.name;
    const earlier = claimedBy.get(column.name);
    if (earlier !== undefined) {
      throw new UnsupportedTypeError(
        column.name,
        `fields '${earlier}' and '${fieldName}' both map to storage column '${column.name}'`,
        { schema: schema.name, field: fieldName, target: storageTypeSystemId(dialect), sourcePath: schema.sourcePath }
      );
    }
    claimedBy.set(column.name, fieldName);
  });
}

function renderColumns(columns: readonly ColumnDefinition[]): string[] {
  const nameWidth = Math.max(...columns.map((column) => column.name.length)) + 1;
  const typeWidth = Math.max(...columns.map((column) => column.type.length)) + 1;

  return columns.map((column) => {
    const namePart = column.name.padEnd(nameWidth);
    if (column.attributes.length === 0) {
      return `  ${namePart}${column.type}`;
    }
    return `  ${namePart}${column.type.padEnd(typeWidth)}${column.attributes.join(' ')}`;
  });
}

/**
 * Generate one Prisma model from a schema's resolved field list.
 *
 * Fields skipped for storage are omitted. Indexed fields that are neither
 * unique nor primary keys get an `@@index` after all columns.
 */
export function generateStorageModel(schema: SchemaDefinition, options: StorageGenerationOptions): string {
  const fields = resolveFields(schema, options.loader).filter((field) => field.overrides.storage?.skip !== true);
  const columns = fields.map((field) => buildColumn(field, schema.name, options.dialect));
  assertDistinctColumns(schema, fields, columns, options.dialect);

  const indexes = fields
    .filter((field) => field.index && !field.unique && !field.primaryKey)
    .map((field) => `  @@index([${field.overrides.storage?.name ?? field.name}])`);

  const lines: string[] = [];
  const description = commentText(schema.description);
  if (description) {
    lines.push(`/// ${description}`);
  }
  lines.push(`model ${schema.name} {`);
  if (columns.length > 0) {
    lines.push(...renderColumns(columns));
  }
  if (indexes.length > 0) {
    lines.push('', ...indexes);
  }
  lines.push('}');

  logGeneration(schema.name, `storage:${options.dialect}`, columns.length);

  return lines.join('\n');
}

function renderPreamble(dialect: StorageDialect): string {
  return `generator client {
  provider = "prisma-client-js"
}

datasource db {
  provider = "${dialect}"
  url      = env("DATABASE_URL")
}`;
}

/**
 * Generate a complete `schema.prisma` holding one model per schema
 */
export function generateStorageSchema(
  schemas: readonly SchemaDefinition[],
  options: StorageGenerationOptions
): string {
  logger.debug({ schemaCount: schemas.length, dialect: options.dialect }, 'Generating storage schema');

  const models = schemas.map((schema) => generateStorageModel(schema, options));
  const sections = [
    renderHeader({
      sources: schemas.map((schema) => schema.sourcePath),
      generatedAt: options.generatedAt ?? new Date(),
    }),
    renderPreamble(options.dialect),
    ...models,
  ];

  return `${sections.join('\n\n')}\n`;
}
