/**
 * Utility exports
 */

// Title utilities
export { titleCase, capitalizeWords } from "./title-case";

// Dialects
export { DIALECTS, resolveDialect } from "./dialect";

// Errors
export {
  MalformedPathError,
  UnknownDialectError,
  ConfigFileError,
} from "./errors";
export type { MalformedPathReason } from "./errors";

// Filesystem utilities
export { fileExists, isDirectory } from "./fs";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export { loadBookConfig } from "./load-book-config";

// Prompt utilities
export { confirm, stdinPrompt } from "./prompt";
export type { Prompt } from "./prompt";

// Classes
export { Logger, levelFromVerbosity } from "./logger";
export { Tracker } from "./tracker";
