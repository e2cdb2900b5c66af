/**
 * Scanner Module
 * Discovers markdown notes below the notes directory
 */

import glob from "fast-glob";
import path from "node:path";
import type { SummaryContext } from "../types";

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Order paths the way a depth-first walk with name-sorted siblings visits them.
 * Names compare by code unit, so "FILE.md" sorts before "file.md".
 */
export function comparePaths(a: string, b: string): number {
  const left = a.split("/");
  const right = b.split("/");
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const order = compareNames(left[i], right[i]);
    if (order !== 0) return order;
  }

  return left.length - right.length;
}

/**
 * List note files relative to a directory
 * Hidden files and anything inside hidden directories are skipped
 *
 * @param exclude - Relative paths to leave out (e.g. the summary file itself)
 */
export async function listNotes(
  directory: string,
  exclude: string[] = [],
): Promise<string[]> {
  const files = await glob("**/*.md", {
    cwd: directory,
    onlyFiles: true,
    dot: false,
    ignore: exclude,
  });

  return files.sort(comparePaths);
}

/**
 * Scans the notes directory and populates context
 *
 * Writes to context:
 * - paths: Relative note paths in walk order
 */
export async function scan(ctx: SummaryContext): Promise<void> {
  const directory = path.resolve(ctx.config.directory);
  const output = path
    .relative(directory, path.resolve(directory, ctx.config.output))
    .split(path.sep)
    .join("/");

  // An output file outside the notes directory can't be picked up anyway
  const exclude = output.startsWith("../") ? [] : [glob.escapePath(output)];
  const paths = await listNotes(directory, exclude);

  ctx.logger.debug(`Found ${paths.length} notes in ${directory}`);
  ctx.tracker.setScannedFiles(paths.length);
  ctx.paths = paths;
}
