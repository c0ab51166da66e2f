/**
 * Benchmark: building and replaying a wide, deep tree.
 *
 * Run: npm run bench
 */

import { bench, describe } from "vitest";
import { PathTreeBuilder, fromPaths } from "./builder.ts";
import { formatTree } from "./format.ts";
import { randomDepthFirstPaths, seededRandom } from "./test-utils.ts";

// -- Test data --

const paths = randomDepthFirstPaths(seededRandom(42), {
  maxDepth: 7,
  maxChildren: 6,
});
const tree = fromPaths(paths);

// -- Benchmarks --

describe(`construction (${paths.length} items)`, () => {
  bench("fromPaths", () => {
    fromPaths(paths);
  });

  bench("enter/leave events", () => {
    const builder = new PathTreeBuilder();
    let open: readonly string[] = [];
    for (const path of paths) {
      while (open.length >= path.length) {
        builder.leave();
        open = open.slice(0, -1);
      }
      const name = path[path.length - 1];
      if (name !== undefined) builder.enter(name);
      open = path;
    }
    builder.finish();
  });
});

describe(`replay (${tree.tokenCount} tokens)`, () => {
  bench("iterate", () => {
    for (const path of tree) void path;
  });

  bench("formatTree", () => {
    formatTree(tree);
  });

  bench("baseline: materialized joined paths", () => {
    paths.map((p) => p.join("/"));
  });
});
