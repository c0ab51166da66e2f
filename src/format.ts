/**
 * Rendering of reconstructed paths as strings.
 *
 * The tree only ever yields component lists; joining them is left to
 * these helpers so callers can pick the separator and root they need.
 */

import type { PathComponents } from "./path.ts";
import type { PathTree } from "./tree.ts";

export interface FormatOptions {
  separator?: string;
  /** Prefix every path with this directory. */
  root?: string;
}

export function formatPath(
  path: PathComponents,
  options: FormatOptions = {},
): string {
  const separator = options.separator ?? "/";
  const joined = path.join(separator);
  const { root } = options;
  if (root === undefined || root === "") return joined;
  return root.endsWith(separator) ? root + joined : root + separator + joined;
}

/**
 * One rendered path per line, in tree order. The tree's own separator and
 * root are used unless overridden.
 */
export function formatTree(
  tree: PathTree,
  options: FormatOptions = {},
): string {
  const pathOptions: FormatOptions = {
    separator: options.separator ?? tree.separator,
    root: options.root ?? tree.root,
  };
  const lines: string[] = [];
  for (const path of tree) {
    lines.push(formatPath(path, pathOptions));
  }
  return lines.join("\n");
}
