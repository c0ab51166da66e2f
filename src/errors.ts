import type { PathComponents } from "./path.ts";

export class PathTreeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = this.constructor.name;
  }
}

export class InvalidComponentError extends PathTreeError {
  readonly component: string;
  readonly reason: string;

  constructor(component: string, reason: string) {
    super(
      "INVALID_COMPONENT",
      `Invalid path component ${JSON.stringify(component)}: ${reason}`,
    );
    this.component = component;
    this.reason = reason;
  }
}

export class UnbalancedLeaveError extends PathTreeError {
  constructor() {
    super("UNBALANCED_LEAVE", "leave() called with no open directory");
  }
}

export class NotDepthFirstError extends PathTreeError {
  readonly index: number;
  readonly path: PathComponents;
  readonly reason: string;

  constructor(index: number, path: PathComponents, reason: string) {
    super(
      "NOT_DEPTH_FIRST",
      `Path #${index} ${JSON.stringify(path)} is not in depth-first order: ${reason}`,
    );
    this.index = index;
    this.path = path;
    this.reason = reason;
  }
}

export class CorruptBufferError extends PathTreeError {
  readonly position: number;

  constructor(position: number) {
    super(
      "CORRUPT_BUFFER",
      `Ascend token at position ${position} has no open component to pop`,
    );
    this.position = position;
  }
}

export class BuilderClosedError extends PathTreeError {
  constructor() {
    super("BUILDER_CLOSED", "Builder was already finished");
  }
}
