/**
 * Renderer Module
 * Writes the chapter tree back out as a SUMMARY.md document
 */

import path from "node:path";
import { resolveDialect, titleCase } from "../utils";
import type { ChapterNode, Dialect, SummaryContext } from "../types";

const INDENT = "    ";

function isReadme(file: string): boolean {
  return path.posix.basename(file).toLowerCase() === "readme.md";
}

function indent(depth: number): string {
  return INDENT.repeat(depth);
}

/**
 * List a chapter's documents, leaving out READMEs
 * (those become the chapter heading instead)
 */
function renderFiles(files: string[], dialect: Dialect, depth: number): string {
  let output = "";

  for (const file of files) {
    if (isReadme(file)) continue;
    const title = titleCase(path.posix.parse(file).name);
    output += `${indent(depth)}${dialect.marker} [${title}](${file})\n`;
  }

  return output;
}

function renderChapter(
  node: ChapterNode,
  dialect: Dialect,
  depth: number,
): string {
  const title = titleCase(node.name);
  const readme = node.files.find(isReadme);

  let output = readme
    ? `${indent(depth)}${dialect.marker} [${title}](${readme})\n`
    : `${indent(depth)}${dialect.unlinkedHeading(title)}\n`;

  output += renderFiles(node.files, dialect, depth + 1);

  for (const child of node.children) {
    output += renderChapter(child, dialect, depth + 1);
  }

  return output;
}

/**
 * Order chapters so the preferred names come first.
 * Names match case-insensitively; unknown and repeated names are ignored.
 * Everything else keeps its original order.
 */
export function orderChapters(
  chapters: ChapterNode[],
  preferredOrder?: readonly string[],
): ChapterNode[] {
  if (!preferredOrder || preferredOrder.length === 0) {
    return chapters;
  }

  const ordered: ChapterNode[] = [];
  const seen = new Set<string>();

  for (const name of preferredOrder) {
    const key = name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);

    const match = chapters.find(
      (chapter) =>
        chapter.name.toLowerCase() === key && !ordered.includes(chapter),
    );
    if (match) {
      ordered.push(match);
    }
  }

  for (const chapter of chapters) {
    if (!ordered.includes(chapter)) {
      ordered.push(chapter);
    }
  }

  return ordered;
}

/**
 * Render the summary document for a chapter tree
 *
 * @example
 * render(build("Summary", ["file1.md"]).root, DIALECTS.md)
 * // "# Summary\n\n- [File1](file1.md)\n"
 */
export function render(
  root: ChapterNode,
  dialect: Dialect,
  preferredOrder?: readonly string[],
): string {
  let output = `# ${root.name}\n\n`;

  output += renderFiles(root.files, dialect, 0);

  for (const chapter of orderChapters(root.children, preferredOrder)) {
    output += renderChapter(chapter, dialect, 0);
  }

  return output;
}

/**
 * Renders the summary text
 *
 * Reads from context:
 * - tree
 * - config.format, config.sort
 *
 * Writes to context:
 * - summary: Complete document text
 */
export function renderSummary(ctx: SummaryContext): void {
  if (!ctx.tree) {
    throw new Error("Builder must run before renderer");
  }

  const dialect = resolveDialect(ctx.config.format);
  ctx.summary = render(ctx.tree, dialect, ctx.config.sort);
}
