import type { CheerioAPI } from "cheerio";

/** Markup inside `<body>`, or the whole document when it has none. */
export function bodyMarkup($: CheerioAPI): string {
  const body = $("body");
  return body.length > 0 ? body.html() ?? "" : $.html();
}
