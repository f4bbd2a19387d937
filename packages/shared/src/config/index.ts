/**
 * Configuration management for polyschema
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// Load environment variables - try the working directory first, then the monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  dotenvConfig({ path: envPath });
}

const booleanFromEnv = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

// Configuration schema; LOG_LEVEL and NODE_ENV are read by the logger
const configSchema = z.object({
  // Where schema sources live and where generated artifacts go
  paths: z.object({
    schemaDir: z.string().min(1).default('./schemas'),
    outputDir: z.string().min(1).default('./generated'),
  }),

  storage: z.object({
    dialect: z.enum(['sqlite', 'postgresql']).default('postgresql'),
  }),

  interface: z.object({
    includeValidation: booleanFromEnv.default('true'),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    paths: {
      schemaDir: process.env.SCHEMA_DIR,
      outputDir: process.env.OUTPUT_DIR,
    },

    storage: {
      dialect: process.env.STORAGE_DIALECT,
    },

    interface: {
      includeValidation: process.env.INCLUDE_VALIDATION_SCHEMA,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}
