/**
 * Interface Generator
 * Emits a client-facing TypeScript interface and, optionally, a Zod schema of
 * the same shape. Inheritance stays in the output: a child interface extends
 * its parent and lists only its own members.
 */

import { logGeneration } from '@polyschema/shared';
import type { FieldDefinition, SchemaDefinition, SchemaLoader } from '../ir/types.js';
import { mapType } from '../catalog/type-catalog.js';
import { loadParent, resolveFields } from '../inheritance/resolver.js';
import { renderHeader } from './header.js';
import { commentText, kebabCase, quote } from './naming.js';
import type { InterfaceGenerationOptions } from './types.js';

export function interfaceFileName(schemaName: string): string {
  return `${kebabCase(schemaName)}.types.ts`;
}

export function validationSchemaName(schemaName: string): string {
  return `${schemaName}Schema`;
}

interface InterfaceMember {
  name: string;
  description: string;
  type: string;
  validation: string;
}

function memberName(field: FieldDefinition): string {
  return field.overrides.interface?.name ?? field.name;
}

function buildMember(field: FieldDefinition, schemaName: string): InterfaceMember {
  const override = field.overrides.interface;
  return {
    name: memberName(field),
    description: commentText(field.description),
    type: mapType(field, 'interface', { override: override?.type, schema: schemaName }),
    validation: mapType(field, 'interface-validation', { override: override?.validationType, schema: schemaName }),
  };
}

/**
 * Parent members the child redeclares
 */
function redeclaredMembers(
  schema: SchemaDefinition,
  members: readonly InterfaceMember[],
  loader: SchemaLoader | undefined
): string[] {
  if (!schema.extends || !loader) {
    return [];
  }
  const parentMembers = new Set(
    resolveFields(loadParent(schema, schema.extends, loader), loader)
      .filter((field) => field.overrides.interface?.skip !== true)
      .map(memberName)
  );
  return members.map((member) => member.name).filter((name) => parentMembers.has(name));
}

function renderImports(schema: SchemaDefinition, includeValidation: boolean): string | null {
  const lines: string[] = [];

  if (includeValidation) {
    lines.push(`import { z } from 'zod';`);
  }
  if (schema.extends) {
    const from = `./${kebabCase(schema.extends)}.types.js`;
    lines.push(
      includeValidation
        ? `import { ${validationSchemaName(schema.extends)}, type ${schema.extends} } from '${from}';`
        : `import type { ${schema.extends} } from '${from}';`
    );
  }

  return lines.length > 0 ? lines.join('\n') : null;
}

function renderInterface(schema: SchemaDefinition, members: readonly InterfaceMember[], omitted: readonly string[]): string {
  let heritage = '';
  if (schema.extends) {
    const parent =
      omitted.length > 0 ? `Omit<${schema.extends}, ${omitted.map(quote).join(' | ')}>` : schema.extends;
    heritage = ` extends ${parent}`;
  }

  const body = members.flatMap((member) => [
    ...(member.description ? [`  /** ${member.description} */`] : []),
    `  ${member.name}: ${member.type};`,
  ]);

  const description = commentText(schema.description);
  const doc = description ? `/**\n * ${description}\n */\n` : '';

  if (body.length === 0) {
    return `${doc}export interface ${schema.name}${heritage} {}`;
  }
  return `${doc}export interface ${schema.name}${heritage} {
${body.join('\n')}
}`;
}

function renderValidationSchema(schema: SchemaDefinition, members: readonly InterfaceMember[]): string {
  const shape = members.map((member) => `  ${member.name}: ${member.validation},`);
  const base = schema.extends ? `${validationSchemaName(schema.extends)}.extend` : 'z.object';
  const body = shape.length > 0 ? `{\n${shape.join('\n')}\n}` : '{}';

  return `/**
 * Runtime validation for ${schema.name}
 */
export const ${validationSchemaName(schema.name)} = ${base}(${body});`;
}

/**
 * Generate the interface module for one schema from its own fields.
 *
 * When a loader is supplied, child members that replace parent members are
 * dropped from the parent through `Omit` so the two declarations cannot clash.
 */
export function generateInterfaceModule(schema: SchemaDefinition, options: InterfaceGenerationOptions = {}): string {
  const includeValidation = options.includeValidation ?? false;
  const members = schema.fields
    .filter((field) => field.overrides.interface?.skip !== true)
    .map((field) => buildMember(field, schema.name));

  const sections: string[] = [
    renderHeader({ sources: [schema.sourcePath], generatedAt: options.generatedAt ?? new Date() }),
  ];

  const imports = renderImports(schema, includeValidation);
  if (imports) {
    sections.push(imports);
  }

  sections.push(renderInterface(schema, members, redeclaredMembers(schema, members, options.loader)));

  if (includeValidation) {
    sections.push(renderValidationSchema(schema, members));
  }

  logGeneration(schema.name, 'interface', members.length);

  return `${sections.join('\n\n')}\n`;
}
