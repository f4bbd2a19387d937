/**
 * Inheritance Resolver
 * Flattens an `extends` chain into one ordered field list.
 */

import { InheritanceCycleError, ParentSchemaNotFoundError } from '@polyschema/shared';
import type { FieldDefinition, SchemaDefinition, SchemaLoader } from '../ir/types.js';
import { mergeByName } from '../runtime/merge.js';

export { mergeByName };

/**
 * Resolve a schema's full field list: ancestors' fields first, then its own,
 * each name kept once at its first position with the most derived definition.
 *
 * @throws InheritanceCycleError when the `extends` chain loops
 * @throws ParentSchemaNotFoundError when the loader cannot supply a parent
 */
export function resolveFields(schema: SchemaDefinition, loader: SchemaLoader): FieldDefinition[] {
  return resolveChain(schema, loader, []);
}

function resolveChain(schema: SchemaDefinition, loader: SchemaLoader, visiting: readonly string[]): FieldDefinition[] {
  if (visiting.includes(schema.name)) {
    throw new InheritanceCycleError([...visiting, schema.name], {
      schema: visiting[0],
      sourcePath: schema.sourcePath,
    });
  }

  if (!schema.extends) {
    return [...schema.fields];
  }

  const parent = loadParent(schema, schema.extends, loader);
  const parentFields = resolveChain(parent, loader, [...visiting, schema.name]);
  return mergeByName(parentFields, schema.fields);
}

/**
 * Load a schema's parent, locating a lookup failure at the child
 */
export function loadParent(schema: SchemaDefinition, parentName: string, loader: SchemaLoader): SchemaDefinition {
  try {
    return loader(parentName);
  } catch (error) {
    if (error instanceof ParentSchemaNotFoundError) {
      throw new ParentSchemaNotFoundError(parentName, {
        schema: schema.name,
        sourcePath: schema.sourcePath,
      });
    }
    throw error;
  }
}

/**
 * Build a loader over an in-memory set of parsed schemas
 */
export function createSchemaLoader(schemas: Iterable<SchemaDefinition>): SchemaLoader {
  const byName = new Map<string, SchemaDefinition>();
  for (const schema of schemas) {
    byName.set(schema.name, schema);
  }

  return (name: string) => {
    const schema = byName.get(name);
    if (!schema) {
      throw new ParentSchemaNotFoundError(name);
    }
    return schema;
  };
}
