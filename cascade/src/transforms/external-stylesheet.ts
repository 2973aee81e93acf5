import { readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import type { HtmlDocument } from "../document/html-document.js";
import type { Transform } from "../types/index.js";
import { CascadeEventKind, errorMessage } from "../types/index.js";
import type { CascadeEventEmitter } from "../events/emitter.js";

const REMOTE_HREF = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Replaces `<link rel="stylesheet" href>` with a `<style>` block holding the
 * linked file. Relative hrefs resolve against `basePath` (or the CWD when
 * not set). Links that cannot be read are reported and left in place;
 * remote hrefs are never fetched.
 */
export class ExternalStylesheetTransform implements Transform {
  constructor(
    private readonly basePath: string = "",
    private readonly emitter?: CascadeEventEmitter,
  ) {}

  apply(document: HtmlDocument): HtmlDocument {
    for (const { element, href } of document.stylesheetLinks()) {
      if (href === undefined || href.trim() === "") {
        this.emitter?.emit(
          CascadeEventKind.EXTERNAL_STYLESHEET_FAILED,
          `<link rel="stylesheet"> has no href`,
          {},
        );
        continue;
      }
      if (REMOTE_HREF.test(href)) {
        this.emitter?.emit(
          CascadeEventKind.EXTERNAL_STYLESHEET_FAILED,
          `Skipped remote stylesheet ${href}`,
          { href },
        );
        continue;
      }

      const fullPath = isAbsolute(href) || this.basePath === "" ? href : join(this.basePath, href);
      let css: string;
      try {
        css = readFileSync(fullPath, "utf-8");
      } catch (err: unknown) {
        this.emitter?.emit(
          CascadeEventKind.EXTERNAL_STYLESHEET_FAILED,
          `Could not read stylesheet "${fullPath}": ${errorMessage(err)}`,
          { href, path: fullPath },
        );
        continue;
      }

      document.replaceWithStyle(element, css);
      this.emitter?.emit(
        CascadeEventKind.EXTERNAL_STYLESHEET_INLINED,
        `Inlined external CSS from ${fullPath}`,
        { href, path: fullPath },
      );
    }
    return document;
  }
}
