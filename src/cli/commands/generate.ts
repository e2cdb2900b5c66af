/**
 * Generate command - Resolves config and runs the summary pipeline
 */

import ora from "ora";
import path from "node:path";
import { z } from "zod";
import {
  isDirectory,
  levelFromVerbosity,
  loadBookConfig,
  loadConfig,
  Logger,
  resolveDialect,
  Tracker,
} from "../../utils";
import * as modules from "../../modules";
import type { SummaryConfig, SummaryContext } from "../../types";

const GenerateOptionsSchema = z.object({
  format: z.string().optional(),
  title: z.string().optional(),
  sort: z.array(z.string()).optional(),
  outputfile: z.string().min(1).optional(),
  notesdir: z.string().min(1).optional(),
  overwrite: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.number().int().nonnegative().default(0),
  debug: z.boolean().optional(),
});

type Options = z.input<typeof GenerateOptionsSchema>;

/**
 * Resolve the effective config
 * Priority: CLI flag > book.toml/book.json > custom/user config > defaults
 */
export async function resolveConfig(
  options: z.infer<typeof GenerateOptionsSchema>,
  tracker: Tracker,
  userConfigPath?: string,
): Promise<SummaryConfig> {
  const { config, errors } = await loadConfig(options.config, userConfigPath);

  for (const err of errors) {
    tracker.trackConfigError(err.path, err.error);
  }

  // Unknown formats fail here, before anything is scanned
  const format = resolveDialect(options.format ?? config.format).name;
  const directory = options.notesdir ?? config.directory;
  const book = await loadBookConfig(directory, format);

  return {
    ...config,
    format,
    title: options.title ?? book?.title ?? config.title,
    sort: options.sort ?? config.sort,
    output: options.outputfile ?? config.output,
    directory: options.notesdir ?? book?.directory ?? config.directory,
    overwrite: options.overwrite ?? config.overwrite,
    logging: {
      level: options.debug
        ? "debug"
        : levelFromVerbosity(options.verbose, config.logging.level),
    },
  };
}

export async function generateCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = GenerateOptionsSchema.parse(opts);
    const tracker = new Tracker();
    const config = await resolveConfig(options, tracker);

    if (!(await isDirectory(config.directory))) {
      throw new Error(`Path ${path.resolve(config.directory)} not found!`);
    }

    const ctx: SummaryContext = {
      config,
      tracker,
      logger: new Logger(config.logging.level),
      verbose: options.verbose,
    };

    if (options.verbose > 2) {
      spinner.stop();
      ctx.logger.debug(`Config: ${JSON.stringify(config, null, 2)}`);
    }

    spinner.start("Scanning notes...");
    await modules.scan(ctx);

    if (options.verbose > 2) {
      spinner.stop();
      ctx.logger.debug(`Paths: ${JSON.stringify(ctx.paths, null, 2)}`);
    }

    spinner.start("Building chapters...");
    modules.buildTree(ctx);

    spinner.text = "Rendering summary...";
    modules.renderSummary(ctx);

    if (options.verbose > 2) {
      spinner.stop();
      ctx.logger.debug(`Tree: ${JSON.stringify(ctx.tree, null, 2)}`);
    }

    // The writer may ask on stdin, so the spinner has to be off
    spinner.stop();
    await modules.write(ctx);

    modules.stats(ctx);
  } catch (error) {
    spinner.fail("Summary generation failed");
    console.error(error);
    process.exit(1);
  }
}
