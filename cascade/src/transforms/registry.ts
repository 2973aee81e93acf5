import type { HtmlDocument } from "../document/html-document.js";
import type { Transform } from "../types/index.js";

export class TransformRegistry {
  private readonly transforms: Transform[] = [];

  register(transform: Transform): this {
    this.transforms.push(transform);
    return this;
  }

  get size(): number {
    return this.transforms.length;
  }

  apply(document: HtmlDocument): HtmlDocument {
    return this.transforms.reduce((doc, transform) => transform.apply(doc), document);
  }
}
