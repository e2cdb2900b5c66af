/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";
import { DialectNameSchema } from "./dialect";

// Zod schemas
export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const SummaryConfigSchema = z.object({
  format: DialectNameSchema,
  title: z.string(),
  // Chapters rendered first, in this order (case-insensitive)
  sort: z.array(z.string()).optional(),
  output: z.string().min(1),
  directory: z.string().min(1),
  overwrite: z.boolean(),
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialSummaryConfigSchema = SummaryConfigSchema.partial().extend({
  logging: LoggingConfigSchema.partial().optional(),
});

// book.toml (mdBook): only the [book] table matters here
export const MdBookConfigSchema = z.looseObject({
  book: z
    .looseObject({
      title: z.string().optional(),
      src: z.string().optional(),
    })
    .optional(),
});

// book.json / book.js (GitBook)
export const GitBookConfigSchema = z.looseObject({
  title: z.string().optional(),
  root: z.string().optional(),
});

// Infer TypeScript types from Zod schemas
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type SummaryConfig = z.infer<typeof SummaryConfigSchema>;
export type PartialSummaryConfig = z.infer<typeof PartialSummaryConfigSchema>;

/**
 * Values a book's own config file contributes
 * Directory is already resolved against the config file's location
 */
export interface BookConfig {
  path: string; // Config file the values came from
  title?: string;
  directory?: string;
}

export interface ConfigError {
  path: string;
  error: unknown;
}
