// Construction
export { PathTreeBuilder, fromPaths } from "./builder.ts";
export {
  fromDirectory,
  skipPermissionErrors,
  isPermissionError,
} from "./fs.ts";
export type { PathVisitor, WalkEntry, WalkOptions } from "./fs.ts";

// Buffer and traversal
export { PathTree } from "./tree.ts";
export { PathTreeIterator } from "./iterator.ts";
export { ASCEND, isAscend, toToken } from "./token.ts";
export type { Token, NameToken, AscendToken } from "./token.ts";

// Paths and components
export type { PathComponents, PathInput } from "./path.ts";
export { commonPrefixLength } from "./path.ts";
export { componentProblem, validateComponent } from "./components.ts";

// Options
export { parseTreeOptions, treeOptionsSchema } from "./options.ts";
export type { TreeOptions, ResolvedTreeOptions } from "./options.ts";

// Formatting
export { formatPath, formatTree } from "./format.ts";
export type { FormatOptions } from "./format.ts";

// Serialization and validation
export { createSerializer } from "./serialization.ts";
export type { Serializer, SerializerOptions } from "./serialization.ts";
export { pathTree } from "./schema.ts";

// Errors
export {
  PathTreeError,
  InvalidComponentError,
  UnbalancedLeaveError,
  NotDepthFirstError,
  CorruptBufferError,
  BuilderClosedError,
} from "./errors.ts";
