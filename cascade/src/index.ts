// Types
export * from "./types/index.js";

// Events
export { CascadeEventEmitter } from "./events/index.js";

// Stylesheets
export {
  parseStylesheet,
  parseInlineStyle,
  tokenizeSelector,
  splitSelectorList,
  calculateSpecificity,
  specificityFromTokens,
  fallbackSpecificity,
  compareSpecificity,
  RuleCollector,
  collectRules,
  dynamicPseudoClasses,
} from "./stylesheet/index.js";
export type { SpecificityResult, StylesheetParser } from "./stylesheet/index.js";

// Cascade
export {
  resolveStyle,
  comparePrecedence,
  mergeEntry,
  inlineEntry,
  ruleEntry,
  inheritStyle,
  inheritedEntry,
  ancestorsOf,
  serializeStyle,
  applyCascade,
} from "./cascade/index.js";
export type { CascadeResult } from "./cascade/index.js";

// Pruning
export {
  findInvisibleElements,
  removeInvisibleElements,
  invisibilityReason,
  hasExplicitSize,
} from "./prune/index.js";
export type { InvisibleElement, InvisibleReason } from "./prune/index.js";

// Document
export { HtmlDocument } from "./document/index.js";
export type { StylesheetLink } from "./document/index.js";

// Transforms
export {
  ExternalStylesheetTransform,
  CascadeTransform,
  InvisibleElementTransform,
  TransformRegistry,
  documentPhases,
} from "./transforms/index.js";
export type { PhaseSelection, PhaseConfig } from "./transforms/index.js";
