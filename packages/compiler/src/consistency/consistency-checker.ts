/**
 * Consistency Checker
 * Regenerates record modules and compares them with committed artifacts,
 * ignoring the generated-at line. Drift is reported, never thrown.
 */

import { createChildLogger, DriftError, wrapError, type SchemaCompilerError } from '@polyschema/shared';
import { parseSchema } from '../parser/schema-parser.js';
import { generateRecordModule } from '../generation/record-generator.js';
import { stripTimestamp } from '../generation/header.js';
import type { GenerationOptions } from '../generation/types.js';

const logger = createChildLogger({ component: 'ConsistencyChecker' });

export interface ConsistencyEntry {
  sourcePath: string;
  /** Schema source text */
  source: string;
  artifactPath: string;
  /** Committed artifact text, or null when no artifact exists */
  committed: string | null;
}

export type ConsistencyStatus = 'in-sync' | 'drift' | 'missing' | 'error';

export interface ConsistencyResult {
  sourcePath: string;
  artifactPath: string;
  status: ConsistencyStatus;
  error?: SchemaCompilerError;
}

export interface ConsistencyReport {
  /** True only when every artifact is in sync */
  ok: boolean;
  results: ConsistencyResult[];
}

function normalize(content: string): string {
  return stripTimestamp(content.replace(/\r\n/g, '\n'));
}

/**
 * True when two generations differ at most in their generated-at line
 */
export function artifactsMatch(expected: string, actual: string): boolean {
  return normalize(expected) === normalize(actual);
}

function checkEntry(entry: ConsistencyEntry, options: GenerationOptions): ConsistencyResult {
  const { sourcePath, artifactPath } = entry;

  try {
    const schema = parseSchema(entry.source, { sourcePath });
    const regenerated = generateRecordModule(schema, options);

    if (entry.committed === null) {
      return { sourcePath, artifactPath, status: 'missing' };
    }
    if (artifactsMatch(regenerated, entry.committed)) {
      return { sourcePath, artifactPath, status: 'in-sync' };
    }
    return {
      sourcePath,
      artifactPath,
      status: 'drift',
      error: new DriftError(artifactPath, { schema: schema.name, target: 'record', sourcePath }),
    };
  } catch (error) {
    return { sourcePath, artifactPath, status: 'error', error: wrapError(error, { sourcePath }) };
  }
}

/**
 * Check every entry in one pass
 */
export function checkConsistency(
  entries: readonly ConsistencyEntry[],
  options: GenerationOptions = {}
): ConsistencyReport {
  const results = entries.map((entry) => checkEntry(entry, options));
  const ok = results.every((result) => result.status === 'in-sync');

  logger.debug(
    {
      checked: results.length,
      drifted: results.filter((result) => result.status === 'drift').length,
      ok,
    },
    'Consistency check complete'
  );

  return { ok, results };
}
