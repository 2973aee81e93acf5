export interface CascadeOptions {
  /** Properties copied down from the nearest ancestor that declares them. */
  inheritableProperties: readonly string[];
  /** Pseudo-classes that can be evaluated without a live browser. */
  staticPseudoClasses: readonly string[];
  /** Tags that take up space even when empty. */
  intrinsicSizeTags: readonly string[];
  sizeProperties: readonly string[];
  /** Size values that do not count as an explicit size. */
  zeroSizeValues: readonly string[];
}

export const DEFAULT_CASCADE_OPTIONS: CascadeOptions = {
  inheritableProperties: [
    "color",
    "font-family",
    "font-size",
    "font-weight",
    "line-height",
    "text-align",
    "visibility",
  ],
  staticPseudoClasses: ["nth-child", "nth-of-type"],
  intrinsicSizeTags: [
    "img",
    "input",
    "br",
    "hr",
    "video",
    "audio",
    "canvas",
    "iframe",
    "object",
    "embed",
  ],
  sizeProperties: ["width", "height", "min-width", "min-height"],
  zeroSizeValues: ["auto", "0", "0px", "0em", "0%"],
};

export function resolveOptions(
  overrides: Partial<CascadeOptions> = {},
): CascadeOptions {
  return { ...DEFAULT_CASCADE_OPTIONS, ...overrides };
}
