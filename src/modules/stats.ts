/**
 * Stats Module
 * Displays the run summary and any issues
 */

import chalk from "chalk";
import type { Issue, IssueType, SummaryContext, SummaryStats } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

const ISSUE_LABELS: Record<IssueType, string> = {
  "malformed-path": "Paths rejected",
  config: "Config errors",
  "skipped-write": "Writes skipped",
};

const ISSUE_TYPES: IssueType[] = ["malformed-path", "config", "skipped-write"];

// ============================================================================
// Section Displays
// ============================================================================

function displaySummarySection(ctx: SummaryContext, stats: SummaryStats): void {
  console.log(sectionHeader("Summary"));
  console.log(statRow(chalk.green("◉"), "Notes", stats.scannedFiles, chalk.green));
  console.log(statRow(chalk.cyan("◉"), "Chapters", stats.chapters, chalk.cyan));

  if (ctx.outputPath) {
    const label = ctx.written ? "Written to" : "Kept";
    console.log(statRow(chalk.cyan("◉"), label, ctx.outputPath));
  }
}

function displayIssuesSection(issues: Issue[], verbose: boolean): void {
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.yellow("Issues")));

  for (const type of ISSUE_TYPES) {
    const matching = issues.filter((issue) => issue.type === type);
    if (matching.length === 0) continue;

    console.log(
      statRow(chalk.yellow("✖"), ISSUE_LABELS[type], matching.length, chalk.yellow),
    );

    if (verbose) {
      for (const issue of matching) {
        console.log(`      ${chalk.dim("·")} ${issue.path || chalk.dim("(empty)")}`);
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display processing statistics to console
 */
export function stats(ctx: SummaryContext): void {
  const result = ctx.tracker.getStats();
  const hasIssues = result.issues.length > 0;

  console.log("");

  const statusIcon = hasIssues ? chalk.yellow("◆") : chalk.green("✔");
  const headline = ctx.written === false ? "Summary Unchanged" : "Summary Created";

  console.log(
    `  ${statusIcon} ${chalk.bold(headline)} ${chalk.dim("·")} ${chalk.dim(formatDuration(result.duration))}`,
  );

  displaySummarySection(ctx, result);
  displayIssuesSection(result.issues, (ctx.verbose ?? 0) > 0);

  console.log("");
}
