/**
 * PathTreeIterator replays a token buffer into full paths.
 *
 * Each Name token pushes onto a private stack and yields a copy of the
 * whole stack; each Ascend token pops. The iterator is single-pass: ask
 * the tree for a new one to start over.
 */

import { CorruptBufferError } from "./errors.ts";
import type { PathComponents } from "./path.ts";
import { ASCEND } from "./token.ts";

export class PathTreeIterator implements IterableIterator<PathComponents> {
  readonly #tokens: readonly string[];
  readonly #stack: string[] = [];
  #position = 0;

  constructor(tokens: readonly string[]) {
    this.#tokens = tokens;
  }

  /** Number of components currently open. */
  get depth(): number {
    return this.#stack.length;
  }

  /** Index of the next token to be read. */
  get position(): number {
    return this.#position;
  }

  next(): IteratorResult<PathComponents, undefined> {
    const tokens = this.#tokens;
    while (this.#position < tokens.length) {
      const position = this.#position++;
      const token = tokens[position];
      if (token === undefined) break;

      if (token === ASCEND) {
        if (this.#stack.length === 0) {
          // Nothing after a broken ascend can be trusted
          this.#position = tokens.length;
          throw new CorruptBufferError(position);
        }
        this.#stack.pop();
        continue;
      }

      this.#stack.push(token);
      return { done: false, value: this.#stack.slice() };
    }
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }
}
