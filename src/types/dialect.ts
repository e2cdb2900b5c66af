/**
 * Summary dialect type definitions
 */

import { z } from "zod";

export const DIALECT_NAMES = ["md", "git"] as const;

export const DialectNameSchema = z.enum(DIALECT_NAMES);

export type DialectName = z.infer<typeof DialectNameSchema>;

export interface Dialect {
  name: DialectName;
  marker: "-" | "*";
  // Heading for a chapter that has no README to link to
  unlinkedHeading: (title: string) => string;
}
