/**
 * @polyschema/shared
 * Shared types, logging, errors and configuration for polyschema
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
