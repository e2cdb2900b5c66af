/**
 * Book Config Loader
 * Reads title and source directory from mdBook/GitBook project files
 */

import { readFile } from "fs/promises";
import path from "node:path";
import { parse as parseToml } from "smol-toml";
import { fileExists } from "./fs";
import { ConfigFileError } from "./errors";
import { GitBookConfigSchema, MdBookConfigSchema } from "../types";
import type { BookConfig, DialectName } from "../types";

// Files checked per format; earlier files take precedence, later ones fill gaps
const BOOK_CONFIG_FILES: Record<DialectName, string[]> = {
  md: ["book.toml"],
  git: ["book.json", "book.js"],
};

async function readBookConfig(configPath: string): Promise<BookConfig> {
  const base = path.dirname(configPath);
  const resolve = (dir?: string) =>
    dir === undefined ? undefined : path.resolve(base, dir);

  try {
    const content = await readFile(configPath, "utf-8");

    if (path.extname(configPath) === ".toml") {
      const { book } = MdBookConfigSchema.parse(parseToml(content));
      return {
        path: configPath,
        title: book?.title,
        directory: resolve(book?.src),
      };
    }

    // book.js is read as plain JSON, as GitBook projects commonly ship it
    const { title, root } = GitBookConfigSchema.parse(JSON.parse(content));
    return { path: configPath, title, directory: resolve(root) };
  } catch (error) {
    throw new ConfigFileError(configPath, error);
  }
}

/**
 * Load the book config belonging to a format from the notes directory
 * Returns null when no config file exists
 */
export async function loadBookConfig(
  directory: string,
  format: DialectName,
): Promise<BookConfig | null> {
  const configs: BookConfig[] = [];

  for (const filename of BOOK_CONFIG_FILES[format]) {
    const configPath = path.join(directory, filename);
    if (await fileExists(configPath)) {
      configs.push(await readBookConfig(configPath));
    }
  }

  if (configs.length === 0) {
    return null;
  }

  const [first, ...rest] = configs;
  return rest.reduce<BookConfig>(
    (merged, config) => ({
      path: merged.path,
      title: merged.title ?? config.title,
      directory: merged.directory ?? config.directory,
    }),
    first,
  );
}
