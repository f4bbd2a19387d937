/**
 * Name-keyed merge shared by the inheritance resolver and generated record modules
 */

/**
 * Concatenate lists and deduplicate by `name`.
 * A later entry replaces an earlier one with the same name but keeps the
 * earlier entry's position.
 */
export function mergeByName<T extends { readonly name: string }>(...lists: ReadonlyArray<readonly T[]>): T[] {
  const merged = new Map<string, T>();

  for (const list of lists) {
    for (const item of list) {
      merged.set(item.name, item);
    }
  }

  return [...merged.values()];
}
