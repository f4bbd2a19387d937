/**
 * Identifier and literal helpers shared by the generators
 */

export function kebabCase(str: string): string {
  return str
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1-$2')
    .replace(/[\s_]+/g, '-')
    .toLowerCase();
}

/** `VenueProfile` -> `VENUE_PROFILE` */
export function constantCase(str: string): string {
  return kebabCase(str).replace(/-/g, '_').toUpperCase();
}

/** `entity_name` -> `EntityName` */
export function pascalCase(str: string): string {
  return str
    .split(/[\s_-]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

/**
 * Single-quoted TypeScript string literal
 */
export function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
  return `'${escaped}'`;
}

/**
 * Text safe to place on one line inside a block comment
 */
export function commentText(value: string): string {
  return value.replace(/\s*\n\s*/g, ' ').replace(/\*\//g, '*\\/').trim();
}
