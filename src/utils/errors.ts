/**
 * Error types raised by the summary pipeline
 */

export type MalformedPathReason = "empty-path" | "empty-segment";

/**
 * An input path the tree builder refused to place
 */
export class MalformedPathError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: MalformedPathReason,
  ) {
    super(
      reason === "empty-path"
        ? "Path is empty"
        : `Path "${path}" contains an empty segment`,
    );
    this.name = "MalformedPathError";
  }
}

export class UnknownDialectError extends Error {
  constructor(public readonly dialect: string) {
    super(`Unknown summary format "${dialect}" (expected "md" or "git")`);
    this.name = "UnknownDialectError";
  }
}

/**
 * A book config file that exists but could not be read or parsed
 */
export class ConfigFileError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    const details = cause instanceof Error ? cause.message : String(cause);
    super(`Couldn't load ${path}: ${details}`, { cause });
    this.name = "ConfigFileError";
  }
}
