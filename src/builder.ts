/**
 * PathTreeBuilder: the only writer of a token buffer.
 *
 * Two ways in:
 *
 * - events: `enter(name)` / `leaf(name)` / `leave()` as a depth-first walk
 *   produces them;
 * - whole paths: `push(path)` with each item's full path, in depth-first
 *   pre-order. The builder climbs to the common prefix with the previous
 *   item and descends by the one new component.
 *
 * `finish()` freezes the buffer into a PathTree and closes the builder.
 */

import { validateComponent } from "./components.ts";
import {
  BuilderClosedError,
  NotDepthFirstError,
  UnbalancedLeaveError,
} from "./errors.ts";
import {
  parseTreeOptions,
  type ResolvedTreeOptions,
  type TreeOptions,
} from "./options.ts";
import { commonPrefixLength, type PathInput } from "./path.ts";
import { ASCEND } from "./token.ts";
import { PathTree } from "./tree.ts";

export class PathTreeBuilder {
  readonly #options: ResolvedTreeOptions;
  #tokens: string[] = [];
  readonly #stack: string[] = [];
  // Names already used under each open level; only push() consults them.
  #children: Set<string>[] = [new Set()];
  #size = 0;
  #closed = false;

  constructor(options?: TreeOptions) {
    this.#options = parseTreeOptions(options);
  }

  /** Number of directories currently open. */
  get depth(): number {
    return this.#stack.length;
  }

  /** Number of items appended so far. */
  get size(): number {
    return this.#size;
  }

  enter(name: string): this {
    this.#assertOpen();
    validateComponent(name, this.#options.separator);
    this.#descend(name);
    return this;
  }

  leaf(name: string): this {
    return this.enter(name).leave();
  }

  leave(): this {
    this.#assertOpen();
    if (this.#stack.length === 0) {
      throw new UnbalancedLeaveError();
    }
    this.#ascend();
    return this;
  }

  /**
   * Append one item given its full path. The path must extend the common
   * prefix it shares with the previous item by exactly one component.
   */
  push(path: PathInput): this {
    this.#assertOpen();
    const components =
      typeof path === "string" ? path.split(this.#options.separator) : path;
    const index = this.#size;
    const lcp = commonPrefixLength(this.#stack, components);
    const name = components[lcp];

    if (name === undefined) {
      const reason =
        components.length === 0
          ? "path is empty"
          : "path is the previous item or one of its ancestors";
      throw new NotDepthFirstError(index, components, reason);
    }
    if (components.length > lcp + 1) {
      throw new NotDepthFirstError(
        index,
        components,
        `ancestor ${JSON.stringify(components.slice(0, lcp + 1))} was never added`,
      );
    }
    validateComponent(name, this.#options.separator);
    if (this.#children[lcp]?.has(name)) {
      throw new NotDepthFirstError(
        index,
        components,
        "an earlier sibling has the same path",
      );
    }

    while (this.#stack.length > lcp) this.#ascend();
    this.#descend(name);
    return this;
  }

  /**
   * Freeze the accumulated tokens into a PathTree. Directories still open
   * stay open: trailing ascends carry no information.
   */
  finish(): PathTree {
    this.#assertOpen();
    this.#closed = true;
    const tokens = this.#tokens;
    this.#tokens = [];
    this.#stack.length = 0;
    this.#children = [];
    return new PathTree(tokens, this.#size, this.#options);
  }

  #descend(name: string): void {
    this.#children[this.#stack.length]?.add(name);
    this.#stack.push(name);
    this.#children.push(new Set());
    this.#tokens.push(name);
    this.#size++;
  }

  #ascend(): void {
    this.#stack.pop();
    this.#children.pop();
    this.#tokens.push(ASCEND);
  }

  #assertOpen(): void {
    if (this.#closed) throw new BuilderClosedError();
  }
}

/** Build a tree from full paths listed in depth-first pre-order. */
export function fromPaths(
  paths: Iterable<PathInput>,
  options?: TreeOptions,
): PathTree {
  const builder = new PathTreeBuilder(options);
  for (const path of paths) builder.push(path);
  return builder.finish();
}
