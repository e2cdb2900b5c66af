/**
 * Builder Module
 * Turns the flat list of scanned paths into a chapter tree
 */

import { MalformedPathError } from "../utils/errors";
import type { BuildResult, ChapterNode, SummaryContext } from "../types";

// Child lookup per node, kept beside the tree so nodes stay plain data
type ChildIndex = Map<ChapterNode, Map<string, ChapterNode>>;

function createNode(name: string): ChapterNode {
  return { name, files: [], children: [] };
}

/**
 * Find the child with the given name, appending a new one on first sight
 */
function getOrCreateChild(
  index: ChildIndex,
  parent: ChapterNode,
  name: string,
): ChapterNode {
  let children = index.get(parent);
  if (!children) {
    children = new Map();
    index.set(parent, children);
  }

  const existing = children.get(name);
  if (existing) {
    return existing;
  }

  const child = createNode(name);
  children.set(name, child);
  parent.children.push(child);
  return child;
}

/**
 * Place a path by consuming one segment per level.
 * The leaf keeps the complete relative path so links resolve from the book root.
 */
function insert(
  index: ChildIndex,
  node: ChapterNode,
  segments: string[],
  path: string,
): void {
  if (segments.length === 1) {
    node.files.push(path);
    return;
  }

  const [head, ...rest] = segments;
  insert(index, getOrCreateChild(index, node, head), rest, path);
}

function validate(path: string): MalformedPathError | null {
  if (path.length === 0) {
    return new MalformedPathError(path, "empty-path");
  }
  if (path.split("/").some((segment) => segment.length === 0)) {
    return new MalformedPathError(path, "empty-segment");
  }
  return null;
}

/**
 * Build a chapter tree from slash-delimited relative paths.
 * Child and file order follow first appearance in the input.
 * Malformed entries are skipped and reported, the rest are still placed.
 *
 * @example
 * build("Summary", ["intro.md", "part1/README.md", "part1/setup.md"])
 * // root.files → ["intro.md"]
 * // root.children[0] → { name: "part1", files: ["part1/README.md", "part1/setup.md"], children: [] }
 */
export function build(title: string, paths: readonly string[]): BuildResult {
  const root = createNode(title);
  const index: ChildIndex = new Map();
  const errors: MalformedPathError[] = [];

  for (const path of paths) {
    const error = validate(path);
    if (error) {
      errors.push(error);
      continue;
    }
    insert(index, root, path.split("/"), path);
  }

  return { root, errors };
}

/**
 * Count every chapter below the root
 */
export function countChapters(node: ChapterNode): number {
  return node.children.reduce(
    (total, child) => total + 1 + countChapters(child),
    0,
  );
}

/**
 * Builds the chapter tree from scanned paths
 *
 * Reads from context:
 * - paths
 *
 * Writes to context:
 * - tree: Root chapter titled after the book
 */
export function buildTree(ctx: SummaryContext): void {
  if (!ctx.paths) {
    throw new Error("Scanner must run before builder");
  }

  const { root, errors } = build(ctx.config.title, ctx.paths);

  for (const error of errors) {
    ctx.tracker.trackMalformedPath(error);
    ctx.logger.warn(error.message);
  }

  ctx.tracker.setChapters(countChapters(root));
  ctx.tree = root;
}
