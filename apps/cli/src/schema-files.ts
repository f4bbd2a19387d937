/**
 * Schema Discovery
 * Reads every schema description in a directory, in name order
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join, relative, sep } from 'node:path';
import { ConfigurationError, createChildLogger } from '@polyschema/shared';
import type { SchemaSource } from '@polyschema/compiler';
import { isNotFound } from './fs-errors.js';

const logger = createChildLogger({ component: 'SchemaDiscovery' });

export const SCHEMA_EXTENSIONS: readonly string[] = ['.yaml', '.yml'];

/** Source path as written into generated headers: relative to the working directory, `/`-separated */
function displayPath(path: string): string {
  return relative(process.cwd(), path).split(sep).join('/');
}

export async function discoverSchemaFiles(schemaDir: string): Promise<SchemaSource[]> {
  let entries: string[];
  try {
    entries = await readdir(schemaDir);
  } catch (error) {
    if (isNotFound(error)) {
      throw new ConfigurationError(`Schema directory not found: ${schemaDir}`, { schemaDir });
    }
    throw error;
  }

  const files = entries.filter((entry) => SCHEMA_EXTENSIONS.includes(extname(entry))).sort();
  if (files.length === 0) {
    throw new ConfigurationError(
      `No schema files (${SCHEMA_EXTENSIONS.map((ext) => `*${ext}`).join(', ')}) in ${schemaDir}`,
      { schemaDir }
    );
  }

  logger.debug({ schemaDir, files }, 'Discovered schema files');

  return Promise.all(
    files.map(async (file) => {
      const fullPath = join(schemaDir, file);
      return { path: displayPath(fullPath), content: await readFile(fullPath, 'utf-8') };
    })
  );
}
