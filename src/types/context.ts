/**
 * Summary context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { SummaryConfig } from "./config";
import type { ChapterNode } from "./tree";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";
import type { Prompt } from "../utils/prompt";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  MalformedPathIssue,
  ConfigIssue,
  WriteIssue,
  ConfigIssueReason,
  SummaryStats,
} from "../utils/tracker";

export interface SummaryContext {
  // Input - provided at initialization
  config: SummaryConfig;
  logger: Logger;
  tracker: Tracker;
  prompt?: Prompt; // Asks before overwriting (defaults to stdin)
  verbose?: number; // -v count

  paths?: string[]; // Scanner: relative note paths in walk order
  tree?: ChapterNode; // Builder: root chapter
  summary?: string; // Renderer: document text
  outputPath?: string; // Writer: absolute path of the summary file
  written?: boolean; // Writer: false when the user declined to overwrite
}
