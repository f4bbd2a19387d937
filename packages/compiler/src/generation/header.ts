/**
 * Generated-file header shared by every target
 */

/** Matches the only line allowed to differ between two generations */
export const TIMESTAMP_LINE_PATTERN = /^\/\/ Generated at: /;

export interface HeaderOptions {
  sources: readonly string[];
  generatedAt: Date;
}

export function renderHeader({ sources, generatedAt }: HeaderOptions): string {
  return [
    '// GENERATED FILE - DO NOT EDIT',
    '// Any manual changes will be overwritten on next generation.',
    '//',
    `// Source: ${sources.join(', ')}`,
    `// Generated at: ${generatedAt.toISOString()}`,
    '//',
    '// To make changes, edit the source schema and run: polyschema generate',
  ].join('\n');
}

/**
 * Drop generated-at lines so two generations can be compared
 */
export function stripTimestamp(content: string): string {
  return content
    .split('\n')
    .filter((line) => !TIMESTAMP_LINE_PATTERN.test(line))
    .join('\n');
}
