/**
 * polyschema command-line program
 */

import { Command, Option } from 'commander';
import { getConfig, TARGET_NAMES } from '@polyschema/shared';
import { STORAGE_DIALECTS } from '@polyschema/compiler';
import { runGenerate } from './commands/generate.js';
import { runValidate } from './commands/validate.js';
import { generateOptionsSchema, parseOptions, validateOptionsSchema } from './commands/options.js';

export function createProgram(): Command {
  const config = getConfig();

  const program = new Command('polyschema')
    .description('Compile YAML entity schemas into record, storage, interface and extraction artifacts')
    .version('0.1.0');

  program
    .command('generate')
    .description('Generate artifacts for every schema in the schema directory')
    .option('--schema-dir <dir>', 'directory holding *.yaml schema files', config.paths.schemaDir)
    .option('--output-dir <dir>', 'directory receiving generated files', config.paths.outputDir)
    .addOption(
      new Option('--dialect <dialect>', 'storage schema dialect')
        .choices(STORAGE_DIALECTS)
        .default(config.storage.dialect)
    )
    .addOption(
      new Option('--target <targets...>', 'targets to generate')
        .choices(TARGET_NAMES)
        .default([...TARGET_NAMES])
    )
    .option('--schema <names...>', 'limit per-schema targets to these schema names')
    .addOption(
      new Option('--no-validation', 'leave Zod validation schemas out of interface modules').default(
        config.interface.includeValidation
      )
    )
    .option('-f, --force', 'overwrite existing files without asking', false)
    .option('--dry-run', 'list the files that would be written without writing them', false)
    .action(async (rawOptions: unknown) => {
      const result = await runGenerate(parseOptions(generateOptionsSchema, rawOptions));
      if (!result.success) {
        process.exitCode = 1;
      }
    });

  program
    .command('validate')
    .description('Check committed record modules for drift from their schemas')
    .option('--schema-dir <dir>', 'directory holding *.yaml schema files', config.paths.schemaDir)
    .option('--output-dir <dir>', 'directory holding generated files', config.paths.outputDir)
    .action(async (rawOptions: unknown) => {
      const report = await runValidate(parseOptions(validateOptionsSchema, rawOptions));
      if (!report.ok) {
        process.exitCode = 1;
      }
    });

  return program;
}
