export { parseStylesheet, parseInlineStyle } from "./parser.js";
export { tokenizeSelector, splitSelectorList } from "./selector.js";
export {
  calculateSpecificity,
  specificityFromTokens,
  fallbackSpecificity,
  compareSpecificity,
} from "./specificity.js";
export type { SpecificityResult } from "./specificity.js";
export { RuleCollector, collectRules, dynamicPseudoClasses } from "./collect.js";
export type { StylesheetParser } from "./collect.js";
