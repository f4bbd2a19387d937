/**
 * Configuration Tests
 */
import { describe, it, expect, afterEach } from 'vitest';
import { getConfig, resetConfig, validateConfig } from './index.js';

const ENV_KEYS = ['SCHEMA_DIR', 'OUTPUT_DIR', 'STORAGE_DIALECT', 'INCLUDE_VALIDATION_SCHEMA'] as const;

describe('config', () => {
  afterEach(() => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
    resetConfig();
  });

  it('should fall back to defaults', () => {
    const config = getConfig();

    expect(config.paths).toEqual({ schemaDir: './schemas', outputDir: './generated' });
    expect(config.storage.dialect).toBe('postgresql');
    expect(config.interface.includeValidation).toBe(true);
  });

  it('should hold only compiler settings', () => {
    expect(Object.keys(getConfig())).toEqual(['paths', 'storage', 'interface']);
  });

  it('should read settings from the environment', () => {
    process.env.SCHEMA_DIR = 'defs';
    process.env.STORAGE_DIALECT = 'sqlite';
    process.env.INCLUDE_VALIDATION_SCHEMA = '0';

    const config = getConfig();

    expect(config.paths.schemaDir).toBe('defs');
    expect(config.storage.dialect).toBe('sqlite');
    expect(config.interface.includeValidation).toBe(false);
  });

  it('should cache the loaded configuration until reset', () => {
    const first = getConfig();
    process.env.STORAGE_DIALECT = 'sqlite';

    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig().storage.dialect).toBe('sqlite');
  });

  it('should report invalid settings', () => {
    process.env.STORAGE_DIALECT = 'oracle';

    const result = validateConfig();

    expect(result.valid).toBe(false);
    expect(result.errors?.[0]?.startsWith('storage.dialect: ')).toBe(true);
  });
});
