import { AttributeAction, parse, SelectorType, stringify } from "css-what";
import type { Selector } from "css-what";
import type { SelectorToken } from "../types/index.js";
import { SelectorParseError, SelectorTokenKind } from "../types/index.js";

// Legacy single-colon spellings of pseudo-elements.
const LEGACY_PSEUDO_ELEMENTS = new Set(["first-line", "first-letter", "before", "after"]);

function parseSelectorList(selectorText: string): Selector[][] {
  try {
    return parse(selectorText);
  } catch (err: unknown) {
    throw new SelectorParseError(
      `Invalid selector "${selectorText}": ${err instanceof Error ? err.message : String(err)}`,
      selectorText,
      { cause: err },
    );
  }
}

function toToken(selector: Selector): SelectorToken | undefined {
  switch (selector.type) {
    case SelectorType.Tag:
      return { kind: SelectorTokenKind.TYPE, name: selector.name };
    case SelectorType.Attribute:
      // css-what marks only the `#x` and `.x` shorthands as "quirks";
      // `[id="x"]` and `[class~="x"]` are plain attribute selectors.
      if (selector.ignoreCase === "quirks") {
        if (selector.name === "id" && selector.action === AttributeAction.Equals) {
          return { kind: SelectorTokenKind.ID, name: selector.value };
        }
        if (selector.name === "class" && selector.action === AttributeAction.Element) {
          return { kind: SelectorTokenKind.CLASS, name: selector.value };
        }
      }
      return { kind: SelectorTokenKind.ATTRIBUTE, name: selector.name };
    case SelectorType.Pseudo:
      if (LEGACY_PSEUDO_ELEMENTS.has(selector.name)) {
        return { kind: SelectorTokenKind.PSEUDO_ELEMENT, name: selector.name };
      }
      return { kind: SelectorTokenKind.PSEUDO_CLASS, name: selector.name };
    case SelectorType.PseudoElement:
      return { kind: SelectorTokenKind.PSEUDO_ELEMENT, name: selector.name };
    default:
      // Universal selectors and combinators carry no weight.
      return undefined;
  }
}

/**
 * Tokenizes a selector into the simple-selector kinds that count towards
 * specificity. For a comma list, the tokens of every member are returned.
 */
export function tokenizeSelector(selectorText: string): SelectorToken[] {
  const tokens: SelectorToken[] = [];
  for (const complex of parseSelectorList(selectorText)) {
    for (const part of complex) {
      const token = toToken(part);
      if (token) tokens.push(token);
    }
  }
  return tokens;
}

/**
 * Splits a selector list into its member selectors. A selector that is not
 * a list comes back unchanged; one that cannot be parsed comes back whole.
 */
export function splitSelectorList(selectorText: string): string[] {
  let list: Selector[][];
  try {
    list = parse(selectorText);
  } catch {
    // Kept whole; the failure is reported when its specificity is computed.
    return [selectorText];
  }
  if (list.length <= 1) return [selectorText];
  return list.map((complex) => stringify([complex]));
}
