import { test, expect } from "vitest";
import { fromPaths } from "./builder.ts";
import { CorruptBufferError } from "./errors.ts";
import { PathTreeIterator } from "./iterator.ts";

test("yields each item's full path root-first", () => {
  const it = new PathTreeIterator(["src", "lib", "..", "main.ts"]);
  expect(it.next()).toEqual({ done: false, value: ["src"] });
  expect(it.next()).toEqual({ done: false, value: ["src", "lib"] });
  expect(it.next()).toEqual({ done: false, value: ["src", "main.ts"] });
  expect(it.next()).toEqual({ done: true, value: undefined });
});

test("stays exhausted", () => {
  const it = new PathTreeIterator(["a"]);
  it.next();
  expect(it.next().done).toBe(true);
  expect(it.next().done).toBe(true);
});

test("yielded paths are not changed by later steps", () => {
  const it = new PathTreeIterator(["a", "b", "..", "c"]);
  const first = it.next().value;
  const second = it.next().value;
  it.next();
  expect(first).toEqual(["a"]);
  expect(second).toEqual(["a", "b"]);
});

test("trailing open components are not an error", () => {
  const it = new PathTreeIterator(["a", "b"]);
  expect([...it]).toEqual([["a"], ["a", "b"]]);
  expect(it.depth).toBe(2);
});

test("depth and position follow the replay", () => {
  const it = new PathTreeIterator(["a", "..", "b"]);
  expect(it.position).toBe(0);
  it.next();
  expect(it.position).toBe(1);
  expect(it.depth).toBe(1);
  it.next();
  expect(it.position).toBe(3);
  expect(it.depth).toBe(1);
});

test("ascend with an empty stack is a corrupt buffer", () => {
  const it = new PathTreeIterator(["a", "..", "..", "b"]);
  expect(it.next().value).toEqual(["a"]);

  let caught: unknown;
  try {
    it.next();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(CorruptBufferError);
  if (caught instanceof CorruptBufferError) {
    expect(caught.code).toBe("CORRUPT_BUFFER");
    expect(caught.position).toBe(2);
  }

  // nothing after the broken token is replayed
  expect(it.next().done).toBe(true);
});

test("leading ascend", () => {
  expect(() => [...new PathTreeIterator([".."])]).toThrow(
    "Ascend token at position 0 has no open component to pop",
  );
});

test("independent iterators over one tree", () => {
  const tree = fromPaths(["a", "a/b", "c"]);
  const one = tree.iter();
  const two = tree.iter();

  expect(one.next().value).toEqual(["a"]);
  expect(one.next().value).toEqual(["a", "b"]);
  expect(two.next().value).toEqual(["a"]);
  expect(one.next().value).toEqual(["c"]);
  expect(two.next().value).toEqual(["a", "b"]);
  expect(two.next().value).toEqual(["c"]);
  expect(one.next().done).toBe(true);
  expect(two.next().done).toBe(true);
});

test("draining twice gives the same sequence", () => {
  const tree = fromPaths(["x", "x/y", "x/y/z", "x/w", "v"]);
  expect([...tree]).toEqual([...tree]);
  expect(Array.from(tree.iter())).toEqual([...tree]);
});

test("for...of over the iterator itself", () => {
  const seen: string[] = [];
  for (const path of new PathTreeIterator(["a", "b", "..", "..", "c"])) {
    seen.push(path.join("/"));
  }
  expect(seen).toEqual(["a", "a/b", "c"]);
});
