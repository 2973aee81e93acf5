import type { ComputedStyle } from "../types/index.js";

/** `prop: value[ !important]; ...` in insertion order, no trailing separator. */
export function serializeStyle(style: ComputedStyle): string {
  const parts: string[] = [];
  for (const [property, entry] of style) {
    parts.push(`${property}: ${entry.value}${entry.flagged ? " !important" : ""}`);
  }
  return parts.join("; ");
}
