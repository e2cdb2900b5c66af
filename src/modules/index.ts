/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { buildTree } from "./builder";
export { renderSummary } from "./renderer";
export { write } from "./writer";
export { stats } from "./stats";
