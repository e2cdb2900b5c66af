/**
 * Central type exports
 */

// Configuration
export type {
  SummaryConfig,
  PartialSummaryConfig,
  LoggingConfig,
  LogLevel,
  BookConfig,
  ConfigError,
} from "./config";
export {
  SummaryConfigSchema,
  PartialSummaryConfigSchema,
  MdBookConfigSchema,
  GitBookConfigSchema,
} from "./config";

// Dialects
export type { Dialect, DialectName } from "./dialect";
export { DIALECT_NAMES, DialectNameSchema } from "./dialect";

// Tree
export type { ChapterNode, BuildResult } from "./tree";

// Context
export type {
  SummaryContext,
  Issue,
  IssueType,
  MalformedPathIssue,
  ConfigIssue,
  WriteIssue,
  ConfigIssueReason,
  SummaryStats,
} from "./context";
