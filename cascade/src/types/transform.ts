import type { HtmlDocument } from "../document/html-document.js";

export interface Transform {
  apply(document: HtmlDocument): HtmlDocument;
}
