import { test, expect, describe } from "vitest";
import { fromPaths } from "./builder.ts";
import { formatPath, formatTree } from "./format.ts";
import { PathTree } from "./tree.ts";

describe("formatPath", () => {
  test("joins components", () => {
    expect(formatPath(["src", "lib", "index.ts"])).toBe("src/lib/index.ts");
  });

  test("single component", () => {
    expect(formatPath(["README.md"])).toBe("README.md");
  });

  test("custom separator", () => {
    expect(formatPath(["a", "b"], { separator: "\\" })).toBe("a\\b");
  });

  test("prefixes the root", () => {
    expect(formatPath(["a", "b"], { root: "/srv" })).toBe("/srv/a/b");
  });

  test("root already ending in the separator", () => {
    expect(formatPath(["a"], { root: "/" })).toBe("/a");
    expect(formatPath(["a"], { root: "/srv/" })).toBe("/srv/a");
  });

  test("empty root is ignored", () => {
    expect(formatPath(["a"], { root: "" })).toBe("a");
  });
});

describe("formatTree", () => {
  test("one line per item in tree order", () => {
    const tree = fromPaths(["outer", "outer/a", "outer/b", "outer/b/c"]);
    expect(formatTree(tree)).toBe("outer\nouter/a\nouter/b\nouter/b/c");
  });

  test("uses the tree's root and separator", () => {
    const tree = PathTree.decode("x|y", { separator: "|", root: "top" });
    expect(formatTree(tree)).toBe("top|x\ntop|x|y");
  });

  test("options override the tree", () => {
    const tree = fromPaths(["x", "x/y"], { root: "/data" });
    expect(formatTree(tree, { root: "/mnt", separator: ":" })).toBe(
      "/mnt:x\n/mnt:x:y",
    );
  });

  test("empty tree", () => {
    expect(formatTree(PathTree.empty())).toBe("");
  });
});
