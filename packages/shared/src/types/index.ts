/**
 * Shared types for polyschema
 */

export type { GeneratedFile, TargetName } from './generated-file.js';
export { TARGET_NAMES } from './generated-file.js';
