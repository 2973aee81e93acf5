import type { SelectorToken, Specificity } from "../types/index.js";
import { SelectorTokenKind } from "../types/index.js";
import { tokenizeSelector } from "./selector.js";

export function specificityFromTokens(tokens: readonly SelectorToken[]): Specificity {
  let a = 0;
  let b = 0;
  let c = 0;
  for (const token of tokens) {
    switch (token.kind) {
      case SelectorTokenKind.ID:
        a++;
        break;
      case SelectorTokenKind.CLASS:
      case SelectorTokenKind.ATTRIBUTE:
      case SelectorTokenKind.PSEUDO_CLASS:
        b++;
        break;
      case SelectorTokenKind.TYPE:
      case SelectorTokenKind.PSEUDO_ELEMENT:
        c++;
        break;
    }
  }
  return [a, b, c];
}

/** Rough weight from the raw text, for selectors the tokenizer rejects. */
export function fallbackSpecificity(selectorText: string): Specificity {
  if (selectorText.includes("#")) return [1, 0, 0];
  if (/[.[:]/.test(selectorText)) return [0, 1, 0];
  return [0, 0, 1];
}

export interface SpecificityResult {
  specificity: Specificity;
  /** Set when the fallback heuristic was used. */
  error: Error | undefined;
}

/**
 * Specificity of a selector. Falls back to `fallbackSpecificity` when the
 * selector cannot be tokenized or yields no weighted tokens, so every rule
 * still takes part in the cascade.
 */
export function calculateSpecificity(
  selectorText: string,
  tokenize: (selectorText: string) => SelectorToken[] = tokenizeSelector,
): SpecificityResult {
  let tokens: SelectorToken[];
  try {
    tokens = tokenize(selectorText);
  } catch (err: unknown) {
    return {
      specificity: fallbackSpecificity(selectorText),
      error: err instanceof Error ? err : new Error(String(err)),
    };
  }
  if (tokens.length === 0) {
    return { specificity: fallbackSpecificity(selectorText), error: undefined };
  }
  return { specificity: specificityFromTokens(tokens), error: undefined };
}

/** Negative when `x` is weaker than `y`, positive when stronger, 0 on a tie. */
export function compareSpecificity(x: Specificity, y: Specificity): number {
  if (x[0] !== y[0]) return x[0] - y[0];
  if (x[1] !== y[1]) return x[1] - y[1];
  return x[2] - y[2];
}
