/**
 * Path tree type definitions
 */

import type { MalformedPathError } from "../utils/errors";

/**
 * A chapter in the book hierarchy.
 * The root node carries the book title as its name.
 */
export interface ChapterNode {
  name: string;
  files: string[]; // Full relative paths of documents directly in this chapter
  children: ChapterNode[]; // Subchapters in order of first appearance
}

export interface BuildResult {
  root: ChapterNode;
  errors: MalformedPathError[]; // One per rejected input path
}
