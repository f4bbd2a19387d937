/**
 * validate: check committed record modules against their schemas
 */

import { basename, extname, join } from 'node:path';
import { createChildLogger, isSchemaCompilerError } from '@polyschema/shared';
import {
  checkConsistency,
  parseSchema,
  recordFileName,
  type ConsistencyEntry,
  type ConsistencyReport,
  type SchemaSource,
} from '@polyschema/compiler';
import { discoverSchemaFiles } from '../schema-files.js';
import { FileManager, TARGET_DIRECTORIES } from '../file-manager.js';
import type { ValidateOptions } from './options.js';

const logger = createChildLogger({ component: 'ValidateCommand' });

function schemaNameOf(source: SchemaSource): string {
  try {
    return parseSchema(source.content, { sourcePath: source.path }).name;
  } catch (error) {
    // The checker reports the parse failure for this entry
    if (isSchemaCompilerError(error)) {
      return basename(source.path, extname(source.path));
    }
    throw error;
  }
}

async function toEntry(source: SchemaSource, fileManager: FileManager): Promise<ConsistencyEntry> {
  const artifactPath = join(TARGET_DIRECTORIES.record, recordFileName(schemaNameOf(source)));

  return {
    sourcePath: source.path,
    source: source.content,
    artifactPath: fileManager.getFullPath(artifactPath),
    committed: await fileManager.readFile(artifactPath),
  };
}

export async function runValidate(options: ValidateOptions): Promise<ConsistencyReport> {
  const sources = await discoverSchemaFiles(options.schemaDir);
  const fileManager = new FileManager(options.outputDir);

  const entries: ConsistencyEntry[] = [];
  for (const source of sources) {
    entries.push(await toEntry(source, fileManager));
  }

  const report = checkConsistency(entries);

  for (const result of report.results) {
    if (result.status === 'in-sync') continue;
    logger.warn({
      sourcePath: result.sourcePath,
      artifactPath: result.artifactPath,
      status: result.status,
      error: result.error?.message,
    }, 'Artifact is not in sync');
  }

  logger.info({ checked: report.results.length, ok: report.ok }, 'Validation complete');

  return report;
}
