/**
 * Component-name rules shared by every way of putting names into a tree.
 */

import { InvalidComponentError } from "./errors.ts";
import { ASCEND } from "./token.ts";

export const CURRENT = ".";

/** Describe why `name` cannot be a component, or return undefined if it can. */
export function componentProblem(
  name: string,
  separator: string,
): string | undefined {
  if (name.length === 0) return "component is empty";
  if (name === ASCEND) return `"${ASCEND}" is reserved for ascend tokens`;
  if (name === CURRENT) return `"${CURRENT}" is reserved`;
  if (name.includes(separator)) {
    return `component contains the separator ${JSON.stringify(separator)}`;
  }
  return undefined;
}

export function validateComponent(name: string, separator: string): void {
  const problem = componentProblem(name, separator);
  if (problem !== undefined) {
    throw new InvalidComponentError(name, problem);
  }
}
