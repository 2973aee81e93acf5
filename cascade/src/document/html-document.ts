import { load } from "cheerio";
import type { CheerioAPI } from "cheerio";
import { isTag } from "domhandler";
import type { Element } from "domhandler";
import type { StyleDocument, StyleSource } from "../types/index.js";

export interface StylesheetLink {
  element: Element;
  href: string | undefined;
}

/** `StyleDocument` over a cheerio-parsed HTML document. */
export class HtmlDocument implements StyleDocument<Element> {
  private constructor(private readonly $: CheerioAPI) {}

  static parse(html: string): HtmlDocument {
    return new HtmlDocument(load(html));
  }

  elements(): Element[] {
    return this.$<Element, string>("*").toArray();
  }

  /** Elements matching `selector`, in document order. */
  query(selector: string): Element[] {
    return this.$<Element, string>(selector).toArray();
  }

  tagName(element: Element): string {
    return element.tagName;
  }

  getAttribute(element: Element, name: string): string | undefined {
    return this.$(element).attr(name);
  }

  setAttribute(element: Element, name: string, value: string): void {
    this.$(element).attr(name, value);
  }

  removeAttribute(element: Element, name: string): void {
    this.$(element).removeAttr(name);
  }

  parent(element: Element): Element | undefined {
    const parent = element.parent;
    return parent !== null && isTag(parent) ? parent : undefined;
  }

  hasContent(element: Element): boolean {
    return element.children.length > 0;
  }

  styleSources(): StyleSource<Element>[] {
    return this.$("style")
      .toArray()
      .map((node) => ({ node, text: this.$(node).text() }));
  }

  stylesheetLinks(): StylesheetLink[] {
    return this.$("link")
      .toArray()
      .filter((element) =>
        (this.$(element).attr("rel") ?? "").toLowerCase().split(/\s+/).includes("stylesheet"),
      )
      .map((element) => ({ element, href: this.$(element).attr("href") }));
  }

  /** Swaps a `<link>` for an inline `<style>` block holding `css`. */
  replaceWithStyle(element: Element, css: string): void {
    const style = this.$("<style></style>").text(css);
    this.$(element).replaceWith(style);
  }

  detach(node: Element): void {
    this.$(node).remove();
  }

  remove(element: Element): void {
    this.$(element).remove();
  }

  matches(element: Element, selectorText: string): boolean {
    return this.$(element).is(selectorText);
  }

  serialize(): string {
    return this.$.html();
  }
}
