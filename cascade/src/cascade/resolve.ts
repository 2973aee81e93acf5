import type { ComputedStyle, Declaration, StyleRule, WinningEntry } from "../types/index.js";
import { INLINE_SOURCE_INDEX, INLINE_SPECIFICITY } from "../types/index.js";
import { compareSpecificity } from "../stylesheet/specificity.js";

/**
 * Total precedence order between two entries for the same property:
 * importance, then specificity, then source order. Positive when
 * `candidate` is preferred.
 */
export function comparePrecedence(candidate: WinningEntry, current: WinningEntry): number {
  if (candidate.important !== current.important) {
    return candidate.important ? 1 : -1;
  }
  const bySpecificity = compareSpecificity(candidate.specificity, current.specificity);
  if (bySpecificity !== 0) return bySpecificity;
  return candidate.sourceIndex - current.sourceIndex;
}

/** Replaces the entry for `property` only when `candidate` strictly wins. */
export function mergeEntry(style: ComputedStyle, property: string, candidate: WinningEntry): void {
  const current = style.get(property);
  if (current === undefined || comparePrecedence(candidate, current) > 0) {
    style.set(property, candidate);
  }
}

export function inlineEntry(decl: Declaration): WinningEntry {
  return {
    value: decl.value,
    specificity: INLINE_SPECIFICITY,
    important: true,
    sourceIndex: INLINE_SOURCE_INDEX,
    origin: "inline",
    flagged: decl.important,
  };
}

export function ruleEntry(rule: StyleRule, decl: Declaration): WinningEntry {
  return {
    value: decl.value,
    specificity: rule.specificity,
    important: decl.important,
    sourceIndex: rule.sourceIndex,
    origin: "rule",
    flagged: decl.important,
  };
}

/**
 * Resolves one element's style from its inline declarations and the
 * collected rules. Inline declarations are seeded as important with
 * specificity (1,0,0). `matches` decides which rules apply; nothing else
 * about the element is consulted, and nothing survives the call.
 */
export function resolveStyle(
  inline: readonly Declaration[],
  rules: readonly StyleRule[],
  matches: (selectorText: string) => boolean,
): ComputedStyle {
  const style: ComputedStyle = new Map();

  // Seeding, not merging: a repeated inline property keeps its last value.
  for (const decl of inline) {
    style.set(decl.property, inlineEntry(decl));
  }

  for (const rule of rules) {
    if (!matches(rule.selectorText)) continue;
    for (const decl of rule.declarations) {
      mergeEntry(style, decl.property, ruleEntry(rule, decl));
    }
  }

  return style;
}
