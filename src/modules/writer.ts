/**
 * Writer Module
 * Persists the rendered summary, asking before replacing an existing file
 */

import { mkdir, writeFile } from "fs/promises";
import path from "node:path";
import { confirm, fileExists, stdinPrompt } from "../utils";
import type { SummaryContext } from "../types";

/**
 * Writes the summary to disk
 *
 * Reads from context:
 * - summary
 * - config.directory, config.output, config.overwrite
 *
 * Writes to context:
 * - outputPath: Absolute path of the summary file
 * - written: False when an existing file was kept
 */
export async function write(ctx: SummaryContext): Promise<void> {
  if (ctx.summary === undefined) {
    throw new Error("Renderer must run before writer");
  }

  const outputPath = path.resolve(ctx.config.directory, ctx.config.output);
  ctx.outputPath = outputPath;

  if (!ctx.config.overwrite && (await fileExists(outputPath))) {
    const overwrite = await confirm(
      ctx.prompt ?? stdinPrompt,
      `File ${ctx.config.output} already exists, do you want to overwrite it?`,
    );

    if (!overwrite) {
      ctx.tracker.trackSkippedWrite(outputPath);
      ctx.written = false;
      return;
    }
  }

  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, ctx.summary, "utf-8");
  ctx.logger.debug(`Wrote ${ctx.summary.length} characters to ${outputPath}`);
  ctx.written = true;
}
