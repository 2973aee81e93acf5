import type { HtmlDocument } from "../document/html-document.js";
import type { CascadeOptions, Transform } from "../types/index.js";
import type { CascadeEventEmitter } from "../events/emitter.js";
import { removeInvisibleElements } from "../prune/invisible.js";

export class InvisibleElementTransform implements Transform {
  constructor(
    private readonly options: Partial<CascadeOptions> = {},
    private readonly emitter?: CascadeEventEmitter,
  ) {}

  apply(document: HtmlDocument): HtmlDocument {
    removeInvisibleElements(document, this.options, this.emitter);
    return document;
  }
}
