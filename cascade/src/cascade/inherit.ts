import type { ComputedStyle, Declaration, WinningEntry } from "../types/index.js";
import { INLINE_SOURCE_INDEX, ZERO_SPECIFICITY } from "../types/index.js";

export function inheritedEntry(value: string): WinningEntry {
  return {
    value,
    specificity: ZERO_SPECIFICITY,
    important: false,
    sourceIndex: INLINE_SOURCE_INDEX,
    origin: "inherited",
    flagged: false,
  };
}

/**
 * Fills inheritable properties the cascade left unset from the nearest
 * ancestor whose written style declares them. `ancestors` must be ordered
 * nearest first; `declarationsOf` reads an ancestor's style attribute.
 * Properties no ancestor declares stay unset.
 */
export function inheritStyle<E>(
  style: ComputedStyle,
  ancestors: Iterable<E>,
  declarationsOf: (ancestor: E) => readonly Declaration[],
  inheritableProperties: readonly string[],
): ComputedStyle {
  const missing = new Set(inheritableProperties.filter((property) => !style.has(property)));
  if (missing.size === 0) return style;

  const result: ComputedStyle = new Map(style);
  const found = new Map<string, string>();
  for (const ancestor of ancestors) {
    const own = new Map<string, string>();
    for (const decl of declarationsOf(ancestor)) {
      if (missing.has(decl.property) && !found.has(decl.property)) {
        own.set(decl.property, decl.value);
      }
    }
    for (const [property, value] of own) found.set(property, value);
    if (found.size === missing.size) break;
  }

  // Fixed property order keeps the written style reproducible.
  for (const property of inheritableProperties) {
    const value = found.get(property);
    if (value !== undefined) result.set(property, inheritedEntry(value));
  }
  return result;
}

/** Yields the parents of `element`, nearest first, up to the root. */
export function* ancestorsOf<E>(element: E, parentOf: (element: E) => E | undefined): Generator<E> {
  let current = parentOf(element);
  while (current !== undefined) {
    yield current;
    current = parentOf(current);
  }
}
