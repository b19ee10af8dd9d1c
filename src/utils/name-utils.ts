/**
 * Name Utilities
 *
 * Bone and clip names must be unique inside a skeleton; assets often
 * leave them empty or repeat them.
 */

/**
 * Fills empty names with `${fallback}_${index}` and suffixes repeats
 * with _1, _2, ... in order of appearance.
 */
export function makeUniqueNames(names: Array<string | null | undefined>, fallback: string): string[] {
  const used = new Set<string>();
  return names.map((name, index) => {
    const base = name && name.length > 0 ? name : `${fallback}_${index}`;
    let candidate = base;
    let suffix = 1;
    while (used.has(candidate)) {
      candidate = `${base}_${suffix++}`;
    }
    used.add(candidate);
    return candidate;
  });
}
