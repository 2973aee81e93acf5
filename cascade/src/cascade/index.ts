export { resolveStyle, comparePrecedence, mergeEntry, inlineEntry, ruleEntry } from "./resolve.js";
export { inheritStyle, inheritedEntry, ancestorsOf } from "./inherit.js";
export { serializeStyle } from "./serialize.js";
export { applyCascade } from "./apply.js";
export type { CascadeResult } from "./apply.js";
