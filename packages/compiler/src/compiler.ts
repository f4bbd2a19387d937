/**
 * SchemaCompiler
 * Parses a set of schema sources and runs the requested generators over them
 */

import {
  createChildLogger,
  isSchemaCompilerError,
  ParseError,
  TARGET_NAMES,
  type GeneratedFile,
  type SchemaCompilerError,
  type TargetName,
} from '@polyschema/shared';
import type { SchemaDefinition, SchemaLoader } from './ir/types.js';
import type { StorageDialect } from './catalog/type-catalog.js';
import { parseSchema } from './parser/schema-parser.js';
import { createSchemaLoader } from './inheritance/resolver.js';
import { generateRecordModule, recordFileName } from './generation/record-generator.js';
import { generateStorageSchema, STORAGE_FILE_NAME } from './generation/storage-schema-generator.js';
import { generateInterfaceModule, interfaceFileName } from './generation/interface-generator.js';
import { generateExtractionModel, extractionFileName } from './generation/extraction-model-generator.js';

export interface SchemaSource {
  path: string;
  content: string;
}

export interface SchemaCompilerOptions {
  dialect?: StorageDialect;
  /** Emit a Zod schema beside each interface */
  includeValidation?: boolean;
  /** Timestamp shared by every file of one compilation; defaults to now */
  generatedAt?: Date;
}

export interface CompileOptions {
  /** Limit per-schema targets to these schema names; storage always covers every schema */
  schemas?: readonly string[];
}

export interface ParseResult {
  schemas: SchemaDefinition[];
  /** One entry per source that could not be parsed */
  errors: SchemaCompilerError[];
}

export interface CompileResult {
  files: GeneratedFile[];
  /** Parse failures, then one entry per failed generator invocation */
  errors: SchemaCompilerError[];
}

/**
 * Run one unit of work, collecting a compiler error instead of propagating it
 */
function attempt<T>(errors: SchemaCompilerError[], work: () => T): T | undefined {
  try {
    return work();
  } catch (error) {
    if (!isSchemaCompilerError(error)) {
      throw error;
    }
    errors.push(error);
    return undefined;
  }
}

export class SchemaCompiler {
  private logger = createChildLogger({ component: 'SchemaCompiler' });
  private readonly dialect: StorageDialect;
  private readonly includeValidation: boolean;
  private readonly generatedAt: Date | undefined;

  constructor(options: SchemaCompilerOptions = {}) {
    this.dialect = options.dialect ?? 'postgresql';
    this.includeValidation = options.includeValidation ?? true;
    this.generatedAt = options.generatedAt;
  }

  /**
   * Parse every source. A source that fails to parse, or that repeats an
   * earlier schema name, is reported and left out; the rest still parse.
   */
  parse(sources: readonly SchemaSource[]): ParseResult {
    const byName = new Map<string, SchemaDefinition>();
    const errors: SchemaCompilerError[] = [];

    for (const source of sources) {
      const schema = attempt(errors, () => parseSchema(source.content, { sourcePath: source.path }));
      if (!schema) continue;

      const existing = byName.get(schema.name);
      if (existing) {
        errors.push(
          new ParseError(`Schema '${schema.name}' is already defined in ${existing.sourcePath}`, {
            schema: schema.name,
            sourcePath: source.path,
          })
        );
        continue;
      }
      byName.set(schema.name, schema);
    }

    return { schemas: [...byName.values()], errors };
  }

  /**
   * Compile sources into generated-file descriptors for the requested targets.
   * Each generator invocation succeeds or fails on its own.
   *
   * @throws ParseError when the schema selection names a schema no source defines
   */
  compile(
    sources: readonly SchemaSource[],
    targets: readonly TargetName[] = TARGET_NAMES,
    options: CompileOptions = {}
  ): CompileResult {
    const startTime = Date.now();
    const { schemas, errors } = this.parse(sources);
    const loader = createSchemaLoader(schemas);
    const generatedAt = this.generatedAt ?? new Date();

    const unknown = (options.schemas ?? []).filter((name) => !schemas.some((schema) => schema.name === name));
    if (unknown.length > 0) {
      throw new ParseError(`Unknown schema(s): ${unknown.join(', ')}`);
    }

    const selected = options.schemas
      ? schemas.filter((schema) => options.schemas?.includes(schema.name))
      : schemas;

    this.logger.info({
      schemaCount: schemas.length,
      selected: selected.map((schema) => schema.name),
      targets,
      dialect: this.dialect,
    }, 'Compiling schemas');

    const files: GeneratedFile[] = [];

    for (const target of targets) {
      if (target === 'storage') {
        const content = attempt(errors, () =>
          generateStorageSchema(schemas, { dialect: this.dialect, loader, generatedAt })
        );
        if (content !== undefined) {
          files.push({
            path: STORAGE_FILE_NAME,
            content,
            target,
            sources: schemas.map((schema) => schema.sourcePath),
          });
        }
        continue;
      }

      for (const schema of selected) {
        const file = attempt(errors, () => this.generateForSchema(schema, target, loader, generatedAt));
        if (file) {
          files.push(file);
        }
      }
    }

    this.logger.info({
      fileCount: files.length,
      errorCount: errors.length,
      durationMs: Date.now() - startTime,
    }, 'Compilation complete');

    return { files, errors };
  }

  private generateForSchema(
    schema: SchemaDefinition,
    target: Exclude<TargetName, 'storage'>,
    loader: SchemaLoader,
    generatedAt: Date
  ): GeneratedFile {
    const sources = [schema.sourcePath];

    switch (target) {
      case 'record':
        return {
          path: recordFileName(schema.name),
          content: generateRecordModule(schema, { generatedAt }),
          target,
          sources,
        };
      case 'interface':
        return {
          path: interfaceFileName(schema.name),
          content: generateInterfaceModule(schema, {
            includeValidation: this.includeValidation,
            loader,
            generatedAt,
          }),
          target,
          sources,
        };
      case 'extraction':
        return {
          path: extractionFileName(schema.name),
          content: generateExtractionModel(schema, { loader, generatedAt }),
          target,
          sources,
        };
    }
  }
}
