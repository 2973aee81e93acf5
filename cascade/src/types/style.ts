/** (idCount, classAttrPseudoCount, typeCount), compared most-significant first. */
export type Specificity = readonly [a: number, b: number, c: number];

export const ZERO_SPECIFICITY: Specificity = [0, 0, 0];
export const INLINE_SPECIFICITY: Specificity = [1, 0, 0];

export interface Declaration {
  property: string; // lower-cased
  value: string; // opaque, no unit or shorthand parsing
  important: boolean; // carried an explicit !important marker
}

/** A rule as it comes out of the stylesheet parser, before collection. */
export interface RawRule {
  selectorText: string;
  declarations: Declaration[];
}

export interface StyleRule {
  selectorText: string;
  declarations: Declaration[];
  specificity: Specificity;
  sourceIndex: number;
}

export const SelectorTokenKind = {
  ID: "id",
  CLASS: "class",
  ATTRIBUTE: "attribute",
  PSEUDO_CLASS: "pseudo-class",
  PSEUDO_ELEMENT: "pseudo-element",
  TYPE: "type",
} as const;

export type SelectorTokenKind =
  (typeof SelectorTokenKind)[keyof typeof SelectorTokenKind];

export interface SelectorToken {
  kind: SelectorTokenKind;
  name: string;
}

export type DeclarationOrigin = "inline" | "rule" | "inherited";

export interface WinningEntry {
  value: string;
  specificity: Specificity;
  important: boolean; // precedence weight, not necessarily written back
  sourceIndex: number;
  origin: DeclarationOrigin;
  flagged: boolean; // source text said !important
}

/** Inline declarations sort before every collected rule. */
export const INLINE_SOURCE_INDEX = -1;

export type ComputedStyle = Map<string, WinningEntry>;
