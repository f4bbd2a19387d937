#!/usr/bin/env node
/**
 * polyschema CLI entry point
 */

import { ConfigurationError, createLogger, isSchemaCompilerError, validateConfig } from '@polyschema/shared';
import { createProgram } from './program.js';

const logger = createLogger('CLI');

async function main(): Promise<void> {
  const configCheck = validateConfig();
  if (!configCheck.valid) {
    throw new ConfigurationError(`Invalid environment configuration: ${(configCheck.errors ?? []).join('; ')}`);
  }

  await createProgram().parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (isSchemaCompilerError(err)) {
    logger.error({ code: err.code, context: err.context }, err.message);
  } else {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Unhandled error');
  }
  process.exitCode = 1;
});
