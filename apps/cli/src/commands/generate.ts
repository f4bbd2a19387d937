/**
 * generate: compile the schema directory and write every requested target
 */

import { createChildLogger, type SchemaCompilerError } from '@polyschema/shared';
import { SchemaCompiler } from '@polyschema/compiler';
import { discoverSchemaFiles } from '../schema-files.js';
import { FileManager, type BatchFileWriteResult } from '../file-manager.js';
import type { ConfirmOverwrite } from '../prompt.js';
import type { GenerateOptions } from './options.js';

const logger = createChildLogger({ component: 'GenerateCommand' });

export interface GenerateDependencies {
  confirmOverwrite?: ConfirmOverwrite;
  /** Fixed generation time, shared by every file */
  generatedAt?: Date;
}

export interface GenerateResult extends BatchFileWriteResult {
  /** Sources and generator invocations that failed; their files were not written */
  errors: SchemaCompilerError[];
}

export async function runGenerate(
  options: GenerateOptions,
  dependencies: GenerateDependencies = {}
): Promise<GenerateResult> {
  const sources = await discoverSchemaFiles(options.schemaDir);

  const compiler = new SchemaCompiler({
    dialect: options.dialect,
    includeValidation: options.validation,
    generatedAt: dependencies.generatedAt,
  });
  const { files, errors } = compiler.compile(sources, options.target, { schemas: options.schema });

  for (const error of errors) {
    logger.error({
      code: error.code,
      schema: error.context.schema,
      field: error.context.field,
      target: error.context.target,
      sourcePath: error.context.sourcePath,
    }, error.message);
  }

  logger.info({
    schemaFiles: sources.length,
    files: files.length,
    errors: errors.length,
    targets: options.target,
    outputDir: options.outputDir,
  }, 'Generated artifacts');

  const fileManager = new FileManager(options.outputDir, dependencies.confirmOverwrite);
  const written = await fileManager.writeFiles(files, { force: options.force, dryRun: options.dryRun });

  return { ...written, success: written.success && errors.length === 0, errors };
}
