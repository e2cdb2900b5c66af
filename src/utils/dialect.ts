import { UnknownDialectError } from "./errors";
import type { Dialect, DialectName } from "../types";

export const DIALECTS: Record<DialectName, Dialect> = {
  // mdBook: draft chapters link to an empty anchor
  md: {
    name: "md",
    marker: "-",
    unlinkedHeading: (title) => `- [${title}](#)`,
  },
  // GitBook: plain bullet without link markup
  git: {
    name: "git",
    marker: "*",
    unlinkedHeading: (title) => `* ${title}`,
  },
};

function isDialectName(name: string): name is DialectName {
  return Object.hasOwn(DIALECTS, name);
}

/**
 * Look up a dialect by its format name
 * Throws UnknownDialectError rather than falling back to a default
 */
export function resolveDialect(name: string): Dialect {
  if (!isDialectName(name)) {
    throw new UnknownDialectError(name);
  }
  return DIALECTS[name];
}
