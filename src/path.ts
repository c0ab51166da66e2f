/**
 * Path types.
 *
 * A path is the list of components leading from the root of a tree to
 * one of its items. The root itself is never a component.
 */

export type PathComponents = readonly string[];

/** Whole-path input: a component list, or a string split on the separator. */
export type PathInput = PathComponents | string;

export function commonPrefixLength(
  a: PathComponents,
  b: PathComponents,
): number {
  const max = Math.min(a.length, b.length);
  let i = 0;
  while (i < max && a[i] === b[i]) i++;
  return i;
}
