import { load } from "cheerio";
import { isComment } from "domhandler";
import { bodyMarkup } from "./body.js";

/**
 * Converts HTML to forum BBCode by turning angle brackets into square
 * brackets. Only the body's content is kept; comments and the doctype are
 * dropped, and so are newlines.
 */
export function htmlToBbcode(html: string): string {
  const $ = load(html);
  $.root()
    .find("*")
    .addBack()
    .contents()
    .filter((_, node) => isComment(node))
    .remove();

  return bodyMarkup($).replace(/</g, "[").replace(/>/g, "]").replace(/\n/g, "").trim();
}
