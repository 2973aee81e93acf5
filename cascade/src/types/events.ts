export const CascadeEventKind = {
  STYLESHEET_COLLECTED: "stylesheet_collected",
  STYLESHEET_PARSE_FAILED: "stylesheet_parse_failed",
  STYLESHEET_RECOVERED: "stylesheet_recovered",
  RULE_SKIPPED: "rule_skipped",
  SELECTOR_PARSE_FAILED: "selector_parse_failed",
  SELECTOR_MATCH_FAILED: "selector_match_failed",
  INLINE_STYLE_PARSE_FAILED: "inline_style_parse_failed",
  ELEMENT_REMOVED: "element_removed",
  EXTERNAL_STYLESHEET_INLINED: "external_stylesheet_inlined",
  EXTERNAL_STYLESHEET_FAILED: "external_stylesheet_failed",
} as const;

export type CascadeEventKind =
  (typeof CascadeEventKind)[keyof typeof CascadeEventKind];

export interface CascadeEvent {
  kind: CascadeEventKind;
  timestamp: Date;
  message: string;
  data: Record<string, unknown>;
}

const WARNING_KINDS: ReadonlySet<CascadeEventKind> = new Set([
  CascadeEventKind.STYLESHEET_PARSE_FAILED,
  CascadeEventKind.STYLESHEET_RECOVERED,
  CascadeEventKind.SELECTOR_PARSE_FAILED,
  CascadeEventKind.SELECTOR_MATCH_FAILED,
  CascadeEventKind.INLINE_STYLE_PARSE_FAILED,
  CascadeEventKind.EXTERNAL_STYLESHEET_FAILED,
]);

export function isWarning(event: CascadeEvent): boolean {
  return WARNING_KINDS.has(event.kind);
}

export function createEvent(
  kind: CascadeEventKind,
  message: string,
  data: Record<string, unknown> = {},
): CascadeEvent {
  return { kind, timestamp: new Date(), message, data };
}
