#!/usr/bin/env node

/**
 * CLI entry point for book-summary
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { generateCommand } from "./commands/generate";
import { configCommand } from "./commands/config";

const program = new Command();

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

program
  .name("book-summary")
  .description("Generate a SUMMARY.md for mdBook or GitBook from a notes directory")
  .version("0.1.0");

// Main generation command (default action)
program
  .option("-f, --format <format>", "Summary format: md (mdBook) or git (GitBook)")
  .option("-t, --title <title>", "Title for the summary")
  .option("-s, --sort <chapters...>", "Start with the following chapters")
  .option("-o, --outputfile <file>", "Output file, relative to the notes directory")
  .option("-n, --notesdir <dir>", "Notes directory to build the summary from")
  .option("-y, --overwrite", "Overwrite an existing summary without asking")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output (-v, -vv, -vvv)", increaseVerbosity, 0)
  .option("-d, --debug", "Debug logging")
  .action(generateCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
