import type { HtmlDocument } from "../document/html-document.js";
import type { CascadeOptions, Transform } from "../types/index.js";
import type { CascadeEventEmitter } from "../events/emitter.js";
import { applyCascade } from "../cascade/apply.js";

export class CascadeTransform implements Transform {
  constructor(
    private readonly options: Partial<CascadeOptions> = {},
    private readonly emitter?: CascadeEventEmitter,
  ) {}

  apply(document: HtmlDocument): HtmlDocument {
    applyCascade(document, this.options, this.emitter);
    return document;
  }
}
