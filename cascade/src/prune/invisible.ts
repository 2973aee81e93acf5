import type { CascadeOptions, Declaration, StyleDocument } from "../types/index.js";
import { CascadeEventKind, InlineStyleParseError, resolveOptions } from "../types/index.js";
import type { CascadeEventEmitter } from "../events/emitter.js";
import { parseInlineStyle } from "../stylesheet/parser.js";

export type InvisibleReason = "display-none" | "visibility-hidden" | "empty";

export interface InvisibleElement<E> {
  element: E;
  reason: InvisibleReason;
}

function declarationsOrEmpty(style: string): Declaration[] {
  try {
    return parseInlineStyle(style);
  } catch (err: unknown) {
    if (err instanceof InlineStyleParseError) return [];
    throw err;
  }
}

function declares(declarations: readonly Declaration[], property: string, value: string): boolean {
  return declarations.some(
    (decl) => decl.property === property && decl.value.trim().toLowerCase() === value,
  );
}

function explicitSizeIn(
  declarations: readonly Declaration[],
  options: Pick<CascadeOptions, "sizeProperties" | "zeroSizeValues">,
): boolean {
  const zero = new Set(options.zeroSizeValues.map((v) => v.toLowerCase()));
  return declarations.some(
    (decl) =>
      options.sizeProperties.includes(decl.property) &&
      !zero.has(decl.value.trim().toLowerCase()),
  );
}

export function hasExplicitSize(
  style: string,
  options: Pick<CascadeOptions, "sizeProperties" | "zeroSizeValues">,
): boolean {
  return explicitSizeIn(declarationsOrEmpty(style), options);
}

export function invisibilityReason<E>(
  document: StyleDocument<E>,
  element: E,
  options: CascadeOptions,
): InvisibleReason | undefined {
  const declarations = declarationsOrEmpty(document.getAttribute(element, "style") ?? "");
  if (declares(declarations, "display", "none")) return "display-none";
  if (declares(declarations, "visibility", "hidden")) return "visibility-hidden";

  if (document.hasContent(element)) return undefined;
  const tag = document.tagName(element).toLowerCase();
  if (options.intrinsicSizeTags.includes(tag)) return undefined;
  if (explicitSizeIn(declarations, options)) return undefined;
  return "empty";
}

/**
 * Finds every element that can be deleted without changing the visible
 * layout. Descendants of a found element are not reported separately.
 * The document is not modified.
 */
export function findInvisibleElements<E>(
  document: StyleDocument<E>,
  overrides: Partial<CascadeOptions> = {},
): InvisibleElement<E>[] {
  const options = resolveOptions(overrides);
  const found: InvisibleElement<E>[] = [];
  const selected = new Set<E>();

  const insideSelected = (element: E): boolean => {
    for (let p = document.parent(element); p !== undefined; p = document.parent(p)) {
      if (selected.has(p)) return true;
    }
    return false;
  };

  for (const element of document.elements()) {
    if (insideSelected(element)) continue;
    const reason = invisibilityReason(document, element, options);
    if (reason === undefined) continue;
    selected.add(element);
    found.push({ element, reason });
  }
  return found;
}

/** Deletes what `findInvisibleElements` reports. Returns the number removed. */
export function removeInvisibleElements<E>(
  document: StyleDocument<E>,
  overrides: Partial<CascadeOptions> = {},
  emitter?: CascadeEventEmitter,
): number {
  const doomed = findInvisibleElements(document, overrides);
  for (const { element, reason } of doomed) {
    const tag = document.tagName(element);
    document.remove(element);
    emitter?.emit(CascadeEventKind.ELEMENT_REMOVED, `Removed element (${reason}): <${tag}>`, {
      tag,
      reason,
    });
  }
  return doomed.length;
}
