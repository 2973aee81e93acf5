import type { CascadeOptions, RawRule, StyleRule } from "../types/index.js";
import { CascadeEventKind, DEFAULT_CASCADE_OPTIONS, StylesheetParseError } from "../types/index.js";
import type { CascadeEventEmitter } from "../events/emitter.js";
import { parseStylesheet } from "./parser.js";
import { splitSelectorList } from "./selector.js";
import { calculateSpecificity } from "./specificity.js";

export type StylesheetParser = (source: string, onRecover?: (message: string) => void) => RawRule[];

/**
 * Names of the pseudo-classes and pseudo-elements in a selector that are
 * not in `allowed`. Quoted strings and attribute selectors are ignored so
 * that `[href="http://x"]` does not count.
 */
export function dynamicPseudoClasses(
  selectorText: string,
  allowed: readonly string[],
): string[] {
  const allowedSet = new Set(allowed.map((name) => name.toLowerCase()));
  const stripped = selectorText
    .replace(/"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/g, "")
    .replace(/\[[^\]]*\]/g, "");

  const found: string[] = [];
  for (const match of stripped.matchAll(/::?([a-zA-Z-]*)/g)) {
    const name = (match[1] ?? "").toLowerCase();
    if (!allowedSet.has(name)) found.push(name);
  }
  return found;
}

/**
 * Gathers style rules from every stylesheet of a document, in document
 * order. Each collected rule gets the next value of the collector's own
 * source counter, so later rules always carry a higher `sourceIndex`.
 */
export class RuleCollector {
  private nextSourceIndex = 0;
  private sheetCount = 0;
  private readonly rules: StyleRule[] = [];

  constructor(
    private readonly options: Pick<CascadeOptions, "staticPseudoClasses"> = DEFAULT_CASCADE_OPTIONS,
    private readonly emitter?: CascadeEventEmitter,
    private readonly parse: StylesheetParser = parseStylesheet,
  ) {}

  get collected(): readonly StyleRule[] {
    return this.rules;
  }

  /** Parses and collects one sheet. Returns the number of rules added. */
  addStylesheet(source: string): number {
    const sheet = this.sheetCount++;
    const recovered: string[] = [];
    let rawRules: RawRule[];
    try {
      rawRules = this.parse(source, (message) => recovered.push(message));
    } catch (err: unknown) {
      if (!(err instanceof StylesheetParseError)) throw err;
      this.emitter?.emit(CascadeEventKind.STYLESHEET_PARSE_FAILED, err.message, { sheet });
      return 0;
    }
    if (recovered.length > 0) {
      this.emitter?.emit(
        CascadeEventKind.STYLESHEET_RECOVERED,
        `Skipped ${recovered.length} malformed part(s) of stylesheet ${sheet}: ${recovered.join("; ")}`,
        { sheet, errors: recovered },
      );
    }
    const added = this.addRules(rawRules);
    this.emitter?.emit(
      CascadeEventKind.STYLESHEET_COLLECTED,
      `Collected ${added} rule(s) from stylesheet ${sheet}`,
      { sheet, rules: added },
    );
    return added;
  }

  addRules(rawRules: readonly RawRule[]): number {
    let added = 0;
    for (const raw of rawRules) {
      if (raw.declarations.length === 0) continue;

      const dynamic = dynamicPseudoClasses(raw.selectorText, this.options.staticPseudoClasses);
      if (dynamic.length > 0) {
        this.emitter?.emit(
          CascadeEventKind.RULE_SKIPPED,
          `Skipped "${raw.selectorText}": depends on :${dynamic.join(", :")}`,
          { selector: raw.selectorText, pseudoClasses: dynamic },
        );
        continue;
      }

      for (const selectorText of splitSelectorList(raw.selectorText)) {
        const { specificity, error } = calculateSpecificity(selectorText);
        if (error) {
          this.emitter?.emit(
            CascadeEventKind.SELECTOR_PARSE_FAILED,
            `${error.message}; using specificity (${specificity.join(",")})`,
            { selector: selectorText, specificity },
          );
        }
        this.rules.push({
          selectorText,
          declarations: raw.declarations,
          specificity,
          sourceIndex: this.nextSourceIndex++,
        });
        added++;
      }
    }
    return added;
  }
}

export function collectRules(
  sources: readonly string[],
  options?: Pick<CascadeOptions, "staticPseudoClasses">,
  emitter?: CascadeEventEmitter,
): StyleRule[] {
  const collector = new RuleCollector(options, emitter);
  for (const source of sources) {
    collector.addStylesheet(source);
  }
  return [...collector.collected];
}
