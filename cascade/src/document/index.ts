export { HtmlDocument } from "./html-document.js";
export type { StylesheetLink } from "./html-document.js";
