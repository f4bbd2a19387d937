/**
 * Extraction-Model Generator
 * Emits a lenient Zod model for data of unknown completeness. Fields are
 * optional unless explicitly required for extraction, and carry null-semantics
 * guidance in their descriptions.
 */

import { UnsupportedTypeError, createChildLogger, logGeneration, type SchemaLocation } from '@polyschema/shared';
import type { ExtractionField, SchemaDefinition } from '../ir/types.js';
import { mapType } from '../catalog/type-catalog.js';
import { formatLogicalType } from '../catalog/logical-type.js';
import { resolveFields } from '../inheritance/resolver.js';
import { renderHeader } from './header.js';
import { commentText, kebabCase, quote } from './naming.js';
import { createValidatorRoutine, renderValidatorRoutine, type ValidatorRoutine } from './validators.js';
import type { ExtractionGenerationOptions } from './types.js';

const logger = createChildLogger({ component: 'ExtractionModelGenerator' });

export function extractionFileName(schemaName: string): string {
  return `${kebabCase(schemaName)}.extraction.ts`;
}

export function extractionModelName(schemaName: string): string {
  return `${schemaName}Extraction`;
}

/**
 * A field as it will appear in the extraction model
 */
export interface ExtractionEntry {
  /** Name in the extraction model */
  name: string;
  source: ExtractionField;
}

/**
 * Resolved base fields carry these flags on top of the extraction view
 */
export interface ExtractionFieldSource extends ExtractionField {
  internal: boolean;
  primaryKey: boolean;
}

/**
 * Select, rename and deduplicate the fields of an extraction model.
 *
 * Internal and primary-key fields are left out unless their extraction
 * override sets `skip: false`. The first field to claim an extraction name
 * keeps it; extraction-only fields replace same-named entries.
 */
export function collectExtractionFields(schema: SchemaDefinition, resolved: readonly ExtractionFieldSource[]): ExtractionEntry[] {
  const collected = new Map<string, ExtractionEntry>();

  for (const field of resolved) {
    const skip = field.overrides.extraction?.skip;
    if (skip === true) continue;
    if (skip !== false && (field.internal || field.primaryKey)) continue;

    const name = field.overrides.extraction?.name ?? field.name;
    if (collected.has(name)) continue;
    collected.set(name, { name, source: field });
  }

  for (const field of schema.extractionFields) {
    if (field.overrides.extraction?.skip === true) continue;
    const name = field.overrides.extraction?.name ?? field.name;
    collected.set(name, { name, source: field });
  }

  return [...collected.values()];
}

function isExtractionRequired(field: ExtractionField): boolean {
  return field.overrides.extraction?.required === true;
}

function asSentence(text: string): string {
  return text && !/[.!?]$/.test(text) ? `${text}.` : text;
}

/**
 * Field description with the clause describing how absence is reported
 */
export function describeExtractionField(field: ExtractionField): string {
  const description = commentText(field.description);

  if (isExtractionRequired(field)) {
    if (/required/i.test(description)) {
      return asSentence(description);
    }
    return [asSentence(description), 'REQUIRED.'].filter(Boolean).join(' ');
  }

  if (field.required) {
    const stem = description.replace(/[.\s]+$/, '');
    return stem ? `${stem} (required).` : '(required).';
  }

  if (!field.nullable || /null/i.test(description)) {
    return asSentence(description);
  }

  const clause =
    field.type.kind === 'scalar' && field.type.name === 'boolean'
      ? 'Null means unknown, distinct from false.'
      : 'Null if not found.';
  return [asSentence(description), clause].filter(Boolean).join(' ');
}

function buildRoutines(entry: ExtractionEntry, location: SchemaLocation, takenNames: Set<string>): ValidatorRoutine[] {
  const validators = new Set(entry.source.overrides.extraction?.validators ?? []);
  const routines = [...validators].map((validator) =>
    createValidatorRoutine(validator, entry.name, location, takenNames)
  );

  const { type } = entry.source;
  if (routines.length > 0 && !(type.kind === 'scalar' && type.name === 'string')) {
    throw new UnsupportedTypeError(formatLogicalType(type), 'validators apply to string fields only', location);
  }

  return routines;
}

function renderFieldExpression(entry: ExtractionEntry, routines: readonly ValidatorRoutine[], schemaName: string): string {
  const { source } = entry;
  const override = source.overrides.extraction?.type;
  let expression = mapType(source, 'extraction', { override, schema: schemaName });

  if (!isExtractionRequired(source) && !expression.endsWith('.optional()')) {
    expression += '.optional()';
  }

  const description = describeExtractionField(source);
  if (description) {
    expression += `.describe(${quote(description)})`;
  }

  for (const routine of routines) {
    expression += `.transform(${routine.functionName})`;
  }

  return expression;
}

function absentValuesFor(field: ExtractionField): Array<'null' | 'undefined'> {
  const absent: Array<'null' | 'undefined'> = [];
  if (field.nullable) absent.push('null');
  if (!isExtractionRequired(field)) absent.push('undefined');
  return absent;
}

/**
 * Generate the extraction model module for one schema
 *
 * @throws ValidatorError when a field names an unknown validator
 */
export function generateExtractionModel(schema: SchemaDefinition, options: ExtractionGenerationOptions): string {
  const entries = collectExtractionFields(schema, resolveFields(schema, options.loader));
  const modelName = extractionModelName(schema.name);

  const routineBlocks: string[] = [];
  const functionNames = new Set<string>();
  const shape = entries.map((entry) => {
    const location: SchemaLocation = {
      schema: schema.name,
      field: entry.source.name,
      target: 'extraction',
      sourcePath: schema.sourcePath,
    };
    const routines = buildRoutines(entry, location, functionNames);
    const absent = absentValuesFor(entry.source);
    routineBlocks.push(...routines.map((routine) => renderValidatorRoutine(routine, absent)));
    return `  ${entry.name}: ${renderFieldExpression(entry, routines, schema.name)},`;
  });

  logger.debug({ schema: schema.name, validatorCount: routineBlocks.length }, 'Collected extraction validators');

  const description = commentText(schema.description) || schema.name;
  const model = `/**
 * Extraction model for ${description}
 * Fields may be absent unless required for extraction.
 */
export const ${modelName} = z.object({${shape.length > 0 ? `\n${shape.join('\n')}\n` : ''}});

export type ${modelName} = z.infer<typeof ${modelName}>;`;

  const sections = [
    renderHeader({ sources: [schema.sourcePath], generatedAt: options.generatedAt ?? new Date() }),
    `import { z } from 'zod';`,
    ...routineBlocks,
    model,
  ];

  logGeneration(schema.name, 'extraction', entries.length);

  return `${sections.join('\n\n')}\n`;
}
