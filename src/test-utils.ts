/**
 * Test helpers: seeded random trees.
 *
 * A fixed seed keeps every generated listing reproducible across runs.
 */

import type { PathComponents } from "./path.ts";
import type { Token } from "./token.ts";

export type Random = () => number;

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function seededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface RandomTreeOptions {
  maxDepth: number;
  maxChildren: number;
}

/**
 * Every item of a random tree, as full paths in depth-first pre-order.
 * Sibling names are unique, so the listing has no duplicates.
 */
export function randomDepthFirstPaths(
  random: Random,
  options: RandomTreeOptions,
): PathComponents[] {
  const out: PathComponents[] = [];

  function visit(prefix: string[], depth: number) {
    const children = Math.floor(random() * (options.maxChildren + 1));
    for (let i = 0; i < children; i++) {
      const path = [...prefix, `n${depth}-${i}`];
      out.push(path);
      if (depth + 1 < options.maxDepth) visit(path, depth + 1);
    }
  }

  visit([], 0);
  return out;
}

/** Stack depth after each token. */
export function runningDepths(tokens: Iterable<Token>): number[] {
  const depths: number[] = [];
  let depth = 0;
  for (const token of tokens) {
    depth += token.kind === "ascend" ? -1 : 1;
    depths.push(depth);
  }
  return depths;
}
