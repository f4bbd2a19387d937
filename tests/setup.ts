/**
 * Vitest global test setup
 */
import { afterEach } from 'vitest';
import { resetConfig, resetLogger } from '@polyschema/shared';

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

afterEach(() => {
  resetConfig();
  resetLogger();
});
