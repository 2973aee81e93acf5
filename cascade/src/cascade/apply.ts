import type {
  CascadeOptions,
  ComputedStyle,
  Declaration,
  StyleDocument,
  StyleRule,
} from "../types/index.js";
import { CascadeEventKind, errorMessage, InlineStyleParseError, resolveOptions } from "../types/index.js";
import type { CascadeEventEmitter } from "../events/emitter.js";
import { RuleCollector } from "../stylesheet/collect.js";
import { parseInlineStyle } from "../stylesheet/parser.js";
import { resolveStyle } from "./resolve.js";
import { ancestorsOf, inheritStyle } from "./inherit.js";
import { serializeStyle } from "./serialize.js";

export interface CascadeResult {
  rules: readonly StyleRule[];
  stylesheetsRemoved: number;
  elementsStyled: number;
}

function writtenDeclarations(style: ComputedStyle): Declaration[] {
  return [...style].map(([property, entry]) => ({
    property,
    value: entry.value,
    important: entry.flagged,
  }));
}

/**
 * Folds every stylesheet of `document` into per-element `style`
 * attributes, then detaches the stylesheets.
 *
 * Elements are visited in document order so that each ancestor's style is
 * already written when its descendants inherit from it.
 */
export function applyCascade<E>(
  document: StyleDocument<E>,
  overrides: Partial<CascadeOptions> = {},
  emitter?: CascadeEventEmitter,
): CascadeResult {
  const options = resolveOptions(overrides);

  // Collect everything first, then detach.
  const collector = new RuleCollector(options, emitter);
  const sources = document.styleSources();
  for (const source of sources) {
    collector.addStylesheet(source.text);
  }
  for (const source of sources) {
    document.detach(source.node);
  }
  const rules = collector.collected;

  const readInline = (element: E): Declaration[] => {
    const raw = document.getAttribute(element, "style");
    if (raw === undefined) return [];
    try {
      return parseInlineStyle(raw);
    } catch (err: unknown) {
      if (!(err instanceof InlineStyleParseError)) throw err;
      emitter?.emit(CascadeEventKind.INLINE_STYLE_PARSE_FAILED, err.message, {
        tag: document.tagName(element),
        style: raw,
      });
      return [];
    }
  };

  const written = new Map<E, readonly Declaration[]>();
  const writtenStyleOf = (element: E): readonly Declaration[] => {
    const cached = written.get(element);
    if (cached) return cached;
    const parsed = readInline(element);
    written.set(element, parsed);
    return parsed;
  };

  const unmatchable = new Set<string>();
  const matcherFor = (element: E) => (selectorText: string): boolean => {
    if (unmatchable.has(selectorText)) return false;
    try {
      return document.matches(element, selectorText);
    } catch (err: unknown) {
      unmatchable.add(selectorText);
      emitter?.emit(
        CascadeEventKind.SELECTOR_MATCH_FAILED,
        `Selector "${selectorText}" cannot be matched: ${errorMessage(err)}`,
        { selector: selectorText },
      );
      return false;
    }
  };

  const parentOf = (element: E): E | undefined => document.parent(element);

  let elementsStyled = 0;
  for (const element of document.elements()) {
    const cascaded = resolveStyle(readInline(element), rules, matcherFor(element));
    const style = inheritStyle(
      cascaded,
      ancestorsOf(element, parentOf),
      writtenStyleOf,
      options.inheritableProperties,
    );

    const serialized = serializeStyle(style);
    if (serialized === "") {
      if (document.getAttribute(element, "style") !== undefined) {
        document.removeAttribute(element, "style");
      }
    } else {
      document.setAttribute(element, "style", serialized);
      elementsStyled++;
    }
    written.set(element, writtenDeclarations(style));
  }

  return { rules, stylesheetsRemoved: sources.length, elementsStyled };
}
