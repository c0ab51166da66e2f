/**
 * PathTree: an immutable, depth-first token buffer.
 *
 * Shared ancestry between consecutive items costs nothing: the buffer only
 * stores the components each item adds and the number of levels climbed
 * before it. The only way to read items back is to iterate.
 */

import { validateComponent } from "./components.ts";
import { CorruptBufferError } from "./errors.ts";
import { PathTreeIterator } from "./iterator.ts";
import {
  parseTreeOptions,
  type ResolvedTreeOptions,
  type TreeOptions,
} from "./options.ts";
import type { PathComponents } from "./path.ts";
import { isAscend, toToken, type Token } from "./token.ts";

export class PathTree implements Iterable<PathComponents> {
  readonly #tokens: readonly string[];
  readonly #size: number;
  readonly separator: string;
  readonly root: string | undefined;

  /**
   * @internal Trees come from `PathTreeBuilder.finish()`, `fromTokens()`
   * or `decode()`, which guarantee the buffer never ascends past the root.
   */
  constructor(tokens: string[], size: number, options: ResolvedTreeOptions) {
    this.#tokens = Object.freeze(tokens);
    this.#size = size;
    this.separator = options.separator;
    this.root = options.root;
  }

  static empty(options?: TreeOptions): PathTree {
    return new PathTree([], 0, parseTreeOptions(options));
  }

  /**
   * Rebuild a tree from raw storage strings, where `".."` is an ascend.
   * Every name is validated and the running depth may never go negative.
   */
  static fromTokens(tokens: Iterable<string>, options?: TreeOptions): PathTree {
    const resolved = parseTreeOptions(options);
    const copy: string[] = [];
    let depth = 0;
    let size = 0;
    for (const raw of tokens) {
      if (isAscend(raw)) {
        if (depth === 0) throw new CorruptBufferError(copy.length);
        depth--;
      } else {
        validateComponent(raw, resolved.separator);
        depth++;
        size++;
      }
      copy.push(raw);
    }
    return new PathTree(copy, size, resolved);
  }

  /** Parse the single-string form produced by `encode()`. */
  static decode(text: string, options?: TreeOptions): PathTree {
    const resolved = parseTreeOptions(options);
    if (text === "") return new PathTree([], 0, resolved);
    return PathTree.fromTokens(text.split(resolved.separator), resolved);
  }

  /** Number of items. */
  get size(): number {
    return this.#size;
  }

  /** Number of stored tokens, names and ascends together. */
  get tokenCount(): number {
    return this.#tokens.length;
  }

  *tokens(): IterableIterator<Token> {
    for (const raw of this.#tokens) yield toToken(raw);
  }

  iter(): PathTreeIterator {
    return new PathTreeIterator(this.#tokens);
  }

  [Symbol.iterator](): PathTreeIterator {
    return this.iter();
  }

  /** Every token joined by the separator, e.g. `outer/a/../b`. */
  encode(): string {
    return this.#tokens.join(this.separator);
  }
}
