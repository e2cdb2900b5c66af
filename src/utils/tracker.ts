/**
 * Summary Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import type { MalformedPathError, MalformedPathReason } from "./errors";

// ============================================================================
// Issue Types
// ============================================================================

export type IssueType = "malformed-path" | "config" | "skipped-write";

export type ConfigIssueReason =
  | "schema-validation"
  | "invalid-json"
  | "read-error";

export interface MalformedPathIssue {
  type: "malformed-path";
  path: string;
  reason: MalformedPathReason;
  details: string;
}

export interface ConfigIssue {
  type: "config";
  path: string;
  reason: ConfigIssueReason;
  details: string;
}

export interface WriteIssue {
  type: "skipped-write";
  path: string;
  reason: "skipped";
  details: string;
}

export type Issue = MalformedPathIssue | ConfigIssue | WriteIssue;

export interface SummaryStats {
  scannedFiles: number;
  chapters: number;
  rejectedPaths: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

function mapConfigError(error: unknown): {
  reason: ConfigIssueReason;
  details: string;
} {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.map(String).join(".") || "(root)"}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  if (error instanceof Error) {
    return { reason: "read-error", details: error.message };
  }
  return { reason: "read-error", details: String(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private scannedFiles = 0;
  private chapters = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  setScannedFiles(count: number): void {
    this.scannedFiles = count;
  }

  setChapters(count: number): void {
    this.chapters = count;
  }

  trackMalformedPath(error: MalformedPathError): void {
    this.issues.push({
      type: "malformed-path",
      path: error.path,
      reason: error.reason,
      details: error.message,
    });
  }

  trackConfigError(path: string, error: unknown): void {
    const { reason, details } = mapConfigError(error);
    this.issues.push({ type: "config", path, reason, details });
  }

  trackSkippedWrite(path: string): void {
    this.issues.push({
      type: "skipped-write",
      path,
      reason: "skipped",
      details: "Existing file kept",
    });
  }

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  getStats(): SummaryStats {
    return {
      scannedFiles: this.scannedFiles,
      chapters: this.chapters,
      rejectedPaths: this.getIssues("malformed-path").length,
      issues: this.issues,
      duration: Date.now() - this.startTime.getTime(),
    };
  }
}
