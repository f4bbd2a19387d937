/**
 * Record Generator
 * Emits a TypeScript module describing a schema's fields as `FieldSpec` records,
 * with lookup helpers for in-process callers.
 */

import { logGeneration } from '@polyschema/shared';
import type { DefaultToken, FieldDefinition, SchemaDefinition } from '../ir/types.js';
import { mapType } from '../catalog/type-catalog.js';
import { renderHeader } from './header.js';
import { commentText, constantCase, kebabCase, quote } from './naming.js';
import type { RecordGenerationOptions } from './types.js';

export const RUNTIME_MODULE = '@polyschema/compiler/runtime';

export function recordFileName(schemaName: string): string {
  return `${kebabCase(schemaName)}.ts`;
}

/** Constant holding a schema's full field list */
export function recordFieldsConstant(schemaName: string): string {
  return `${constantCase(schemaName)}_FIELDS`;
}

function renderDefault(token: DefaultToken): string {
  if (token.kind === 'generated') {
    return `{ kind: 'generated', strategy: ${quote(token.strategy)} }`;
  }
  const value = typeof token.value === 'string' ? quote(token.value) : String(token.value);
  return `{ kind: 'literal', value: ${value} }`;
}

function renderFieldSpec(field: FieldDefinition, schemaName: string): string {
  const override = field.overrides.record;
  const typeAnnotation = mapType(field, 'record', { override: override?.type, schema: schemaName });
  const defaultToken = override?.default ?? field.default;

  const properties = [
    `name: ${quote(override?.name ?? field.name)}`,
    `typeAnnotation: ${quote(typeAnnotation)}`,
    `description: ${quote(field.description)}`,
    `nullable: ${field.nullable}`,
    `required: ${field.required}`,
  ];

  // Metadata is only written when it differs from the default
  if (field.index) properties.push('index: true');
  if (field.unique) properties.push('unique: true');
  if (field.primaryKey) properties.push('primaryKey: true');
  if (field.internal) properties.push('internal: true');
  if (field.foreignKey) properties.push(`foreignKey: ${quote(field.foreignKey)}`);
  if (defaultToken) properties.push(`default: ${renderDefault(defaultToken)}`);
  if (field.search?.category !== undefined) {
    properties.push(`searchCategory: ${quote(field.search.category)}`);
  }
  if (field.search?.keywords !== undefined) {
    properties.push(`searchKeywords: [${field.search.keywords.map(quote).join(', ')}]`);
  }

  return ['  {', ...properties.map((property) => `    ${property},`), '  },'].join('\n');
}

function renderFieldList(constant: string, fields: readonly FieldDefinition[], schemaName: string): string {
  if (fields.length === 0) {
    return `export const ${constant}: readonly FieldSpec[] = [];`;
  }
  return `export const ${constant}: readonly FieldSpec[] = [
${fields.map((field) => renderFieldSpec(field, schemaName)).join('\n')}
];`;
}

function renderHelpers(fieldsConstant: string): string {
  return `/**
 * Find a field by name
 */
export function getFieldByName(name: string): FieldSpec | undefined {
  return ${fieldsConstant}.find((field) => field.name === name);
}

/**
 * Fields carrying search metadata
 */
export function getFieldsWithSearchMetadata(): FieldSpec[] {
  return ${fieldsConstant}.filter(
    (field) => field.searchCategory !== undefined || field.searchKeywords !== undefined
  );
}

/**
 * Fields that may be supplied by external extraction (internal fields excluded)
 */
export function getExtractionFields(): FieldSpec[] {
  return ${fieldsConstant}.filter((field) => !field.internal);
}

/**
 * Every field, internal ones included
 */
export function getDatabaseFields(): readonly FieldSpec[] {
  return ${fieldsConstant};
}`;
}

/**
 * Generate the record module for one schema.
 *
 * A base schema gets a single `<NAME>_FIELDS` list. A child schema lists only
 * its own fields (`<NAME>_SPECIFIC_FIELDS`), re-exports the parent's list as
 * `<NAME>_PARENT_FIELDS` and combines both into `<NAME>_FIELDS`.
 */
export function generateRecordModule(schema: SchemaDefinition, options: RecordGenerationOptions = {}): string {
  const fields = schema.fields.filter((field) => field.overrides.record?.skip !== true);
  const prefix = constantCase(schema.name);
  const fieldsConstant = recordFieldsConstant(schema.name);
  const description = commentText(schema.description) || `${schema.name} fields`;

  const sections: string[] = [
    renderHeader({ sources: [schema.sourcePath], generatedAt: options.generatedAt ?? new Date() }),
  ];

  if (schema.extends) {
    const parentConstant = recordFieldsConstant(schema.extends);
    const specificConstant = `${prefix}_SPECIFIC_FIELDS`;
    const parentAlias = `${prefix}_PARENT_FIELDS`;

    sections.push(
      `import { mergeFieldSpecs, type FieldSpec } from '${RUNTIME_MODULE}';
import { ${parentConstant} } from './${kebabCase(schema.extends)}.js';`,
      `/**
 * Fields inherited from ${schema.extends}
 */
export const ${parentAlias}: readonly FieldSpec[] = ${parentConstant};`,
      `/**
 * Fields declared by ${schema.name}
 */
${renderFieldList(specificConstant, fields, schema.name)}`,
      `/**
 * ${description}
 * Inherited fields first, then ${schema.name}'s own.
 */
export const ${fieldsConstant}: readonly FieldSpec[] = mergeFieldSpecs(${parentAlias}, ${specificConstant});`
    );
  } else {
    sections.push(
      `import type { FieldSpec } from '${RUNTIME_MODULE}';`,
      `/**
 * ${description}
 */
${renderFieldList(fieldsConstant, fields, schema.name)}`
    );
  }

  sections.push(renderHelpers(fieldsConstant));

  logGeneration(schema.name, 'record', fields.length);

  return `${sections.join('\n\n')}\n`;
}
