/**
 * Generated artifact descriptors passed from the compiler to its callers
 */

/**
 * The four representations a schema compiles into
 */
export const TARGET_NAMES = ['record', 'storage', 'interface', 'extraction'] as const;

export type TargetName = (typeof TARGET_NAMES)[number];

/**
 * A single generated file
 */
export interface GeneratedFile {
  /** Path relative to the target's output directory */
  path: string;

  /** File content */
  content: string;

  /** Which generator produced it */
  target: TargetName;

  /** Schema source file(s) it was generated from */
  sources: string[];
}
