/**
 * Build a PathTree from a directory on disk.
 *
 * The walk is depth-first and synchronous. Entries are listed with their
 * file types, so symbolic links are recorded but never followed. Items in
 * the resulting tree are relative to `root`, which becomes the tree's root.
 */

import { readdirSync, type Dirent } from "node:fs";
import { join, sep } from "node:path";
import { PathTreeBuilder } from "./builder.ts";
import type { PathTree } from "./tree.ts";

export interface WalkEntry {
  readonly name: string;
  /** Full path: the walked root joined with every component. */
  readonly path: string;
  readonly dirent: Dirent;
}

export interface PathVisitor {
  /**
   * Return false to leave the entry out, along with everything below it
   * when it is a directory.
   */
  filter?(entry: WalkEntry): boolean;
  /** Called for each included entry, after `filter`. */
  visit?(entry: WalkEntry): void;
  /**
   * Decide what happens to an error raised while listing `directory` or
   * adding `entry` (including errors thrown by `filter` and `visit`).
   * Return `undefined` to skip the failing entry and keep walking; any
   * other value is thrown from `fromDirectory`.
   */
  handleError?(error: unknown, directory: string, entry?: WalkEntry): unknown;
}

export interface WalkOptions {
  visitor?: PathVisitor;
  /** Receives errors the default handler skips. Defaults to console.warn. */
  onWarning?: (message: string, error: unknown) => void;
}

/** Carries a fatal error up through the enclosing directories untouched. */
class Abort {
  constructor(readonly error: unknown) {}
}

interface Walk {
  builder: PathTreeBuilder;
  visitor: PathVisitor;
  handleError(error: unknown, directory: string, entry?: WalkEntry): unknown;
}

export function isPermissionError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "EACCES" || error.code === "EPERM")
  );
}

/**
 * Default error policy: permission errors are reported and skipped, every
 * other error stops the walk.
 */
export function skipPermissionErrors(
  error: unknown,
  directory: string,
  entry: WalkEntry | undefined,
  onWarning: (message: string, error: unknown) => void,
): unknown {
  if (!isPermissionError(error)) return error;
  const description =
    entry === undefined ? `item in \`${directory}\`` : `\`${entry.path}\``;
  const reason = error instanceof Error ? error.message : String(error);
  onWarning(`Permission denied reading ${description}: ${reason}`, error);
  return undefined;
}

export function fromDirectory(
  root: string,
  options: WalkOptions = {},
): PathTree {
  const visitor = options.visitor ?? {};
  const onWarning =
    options.onWarning ?? ((message: string) => console.warn(message));
  const walk: Walk = {
    builder: new PathTreeBuilder({ separator: sep, root }),
    visitor,
    handleError: (error, directory, entry) =>
      visitor.handleError
        ? visitor.handleError(error, directory, entry)
        : skipPermissionErrors(error, directory, entry, onWarning),
  };

  try {
    walkDirectory(walk, root);
  } catch (err) {
    if (err instanceof Abort) throw err.error;
    throw err;
  }
  return walk.builder.finish();
}

function walkDirectory(walk: Walk, directory: string): void {
  let dirents: Dirent[];
  try {
    dirents = readdirSync(directory, { withFileTypes: true });
  } catch (err) {
    fail(walk, err, directory, undefined);
    return;
  }

  for (const dirent of dirents) {
    const entry: WalkEntry = {
      name: dirent.name,
      path: join(directory, dirent.name),
      dirent,
    };
    try {
      addEntry(walk, entry);
    } catch (err) {
      if (err instanceof Abort) throw err;
      fail(walk, err, directory, entry);
    }
  }
}

function addEntry(walk: Walk, entry: WalkEntry): void {
  const { visitor, builder } = walk;
  if (visitor.filter && !visitor.filter(entry)) return;
  visitor.visit?.(entry);

  // Type first: nothing may be appended for an entry that fails
  const isDirectory = entry.dirent.isDirectory();

  builder.enter(entry.name);
  try {
    if (isDirectory) walkDirectory(walk, entry.path);
  } finally {
    builder.leave();
  }
}

function fail(
  walk: Walk,
  error: unknown,
  directory: string,
  entry: WalkEntry | undefined,
): void {
  const fatal = walk.handleError(error, directory, entry);
  if (fatal !== undefined) throw new Abort(fatal);
}
