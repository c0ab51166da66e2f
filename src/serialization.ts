/**
 * Serialization layer using devalue with custom reducers/revivers.
 *
 * Trees travel as their encoded single-string form, so the payload stays
 * as compact as the tree itself. Revived trees are validated again.
 */

import { stringify, parse } from "devalue";
import {
  PathTreeError,
  InvalidComponentError,
  UnbalancedLeaveError,
  NotDepthFirstError,
  CorruptBufferError,
  BuilderClosedError,
} from "./errors.ts";
import { PathTree } from "./tree.ts";

type Reducer = (value: unknown) => false | unknown[];
type Reviver = (value: unknown) => unknown;

export interface Serializer {
  stringify(value: unknown): string;
  parse(str: string): unknown;
}

export interface SerializerOptions {
  reducers?: Record<string, Reducer>;
  revivers?: Record<string, Reviver>;
}

const builtinReducers: Record<string, Reducer> = {
  PathTree: (v) => v instanceof PathTree && [v.encode(), v.separator, v.root],
  PathTreeError: (v) =>
    v instanceof PathTreeError &&
    v.constructor === PathTreeError && [v.code, v.message],
  InvalidComponentError: (v) =>
    v instanceof InvalidComponentError && [v.component, v.reason],
  UnbalancedLeaveError: (v) => v instanceof UnbalancedLeaveError && [],
  NotDepthFirstError: (v) =>
    v instanceof NotDepthFirstError && [v.index, [...v.path], v.reason],
  CorruptBufferError: (v) => v instanceof CorruptBufferError && [v.position],
  BuilderClosedError: (v) => v instanceof BuilderClosedError && [],
};

function asArray(tag: string, value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new TypeError(`Malformed ${tag} payload`);
  }
  return value;
}

function asString(tag: string, value: unknown): string {
  if (typeof value !== "string") {
    throw new TypeError(`Malformed ${tag} payload`);
  }
  return value;
}

function asNumber(tag: string, value: unknown): number {
  if (typeof value !== "number") {
    throw new TypeError(`Malformed ${tag} payload`);
  }
  return value;
}

const builtinRevivers: Record<string, Reviver> = {
  PathTree: (value) => {
    const [encoded, separator, root] = asArray("PathTree", value);
    return PathTree.decode(asString("PathTree", encoded), {
      separator: asString("PathTree", separator),
      root: root === undefined ? undefined : asString("PathTree", root),
    });
  },
  PathTreeError: (value) => {
    const [code, message] = asArray("PathTreeError", value);
    return new PathTreeError(
      asString("PathTreeError", code),
      asString("PathTreeError", message),
    );
  },
  InvalidComponentError: (value) => {
    const [component, reason] = asArray("InvalidComponentError", value);
    return new InvalidComponentError(
      asString("InvalidComponentError", component),
      asString("InvalidComponentError", reason),
    );
  },
  UnbalancedLeaveError: () => new UnbalancedLeaveError(),
  NotDepthFirstError: (value) => {
    const [index, path, reason] = asArray("NotDepthFirstError", value);
    return new NotDepthFirstError(
      asNumber("NotDepthFirstError", index),
      asArray("NotDepthFirstError", path).map((c) =>
        asString("NotDepthFirstError", c),
      ),
      asString("NotDepthFirstError", reason),
    );
  },
  CorruptBufferError: (value) => {
    const [position] = asArray("CorruptBufferError", value);
    return new CorruptBufferError(asNumber("CorruptBufferError", position));
  },
  BuilderClosedError: () => new BuilderClosedError(),
};

export function createSerializer(options: SerializerOptions = {}): Serializer {
  const reducers = { ...options.reducers, ...builtinReducers };
  const revivers = { ...options.revivers, ...builtinRevivers };
  return {
    stringify(value: unknown): string {
      return stringify(value, reducers);
    },
    parse(str: string): unknown {
      return parse(str, revivers);
    },
  };
}
