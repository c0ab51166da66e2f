/**
 * Standard Schema that validates unknown input and coerces it to a PathTree.
 *
 * Accepts an existing tree, its encoded single-string form, or a list of
 * whole paths in depth-first order. Construction failures are reported as
 * issues instead of being thrown.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { fromPaths } from "./builder.ts";
import { NotDepthFirstError, PathTreeError } from "./errors.ts";
import type { TreeOptions } from "./options.ts";
import type { PathInput } from "./path.ts";
import { PathTree } from "./tree.ts";

function isPathInput(value: unknown): value is PathInput {
  return (
    typeof value === "string" ||
    (Array.isArray(value) && value.every((c) => typeof c === "string"))
  );
}

function isPathList(value: unknown): value is PathInput[] {
  return Array.isArray(value) && value.every(isPathInput);
}

function issueFor(err: PathTreeError): StandardSchemaV1.Issue {
  if (err instanceof NotDepthFirstError) {
    return { message: err.message, path: [err.index] };
  }
  return { message: err.message };
}

export function pathTree(
  options?: TreeOptions,
): StandardSchemaV1<unknown, PathTree> {
  return {
    "~standard": {
      version: 1,
      vendor: "pathpack",
      validate(input: unknown): StandardSchemaV1.Result<PathTree> {
        try {
          if (input instanceof PathTree) return { value: input };
          if (typeof input === "string") {
            return { value: PathTree.decode(input, options) };
          }
          if (isPathList(input)) return { value: fromPaths(input, options) };
        } catch (err) {
          if (err instanceof PathTreeError) return { issues: [issueFor(err)] };
          throw err;
        }
        return {
          issues: [
            {
              message:
                "Expected a path tree, its encoded form, or a list of paths",
            },
          ],
        };
      },
    },
  };
}
