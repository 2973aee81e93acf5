import { describe, test, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  CascadeTransform,
  ExternalStylesheetTransform,
  InvisibleElementTransform,
  TransformRegistry,
  documentPhases,
} from "../../src/transforms/index.js";
import { HtmlDocument } from "../../src/document/html-document.js";
import { CascadeEventEmitter } from "../../src/events/emitter.js";
import { CascadeEventKind } from "../../src/types/index.js";
import type { CascadeEvent, Transform } from "../../src/types/index.js";

let tmpDir = "";

beforeAll(() => {
  tmpDir = mkdtempSync(join(tmpdir(), "cascade-transforms-"));
  writeFileSync(join(tmpDir, "site.css"), "p{color:red}");
});

afterAll(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

function recorder(): { emitter: CascadeEventEmitter; events: CascadeEvent[] } {
  const emitter = new CascadeEventEmitter();
  const events: CascadeEvent[] = [];
  emitter.subscribe((e) => events.push(e));
  return { emitter, events };
}

describe("ExternalStylesheetTransform", () => {
  test("inlines a linked file relative to the base path", () => {
    const { emitter, events } = recorder();
    const doc = HtmlDocument.parse('<link rel="stylesheet" href="site.css"><p>x</p>');

    new ExternalStylesheetTransform(tmpDir, emitter).apply(doc);

    expect(doc.stylesheetLinks()).toHaveLength(0);
    expect(doc.styleSources().map((s) => s.text)).toEqual(["p{color:red}"]);
    expect(events.map((e) => e.kind)).toEqual([CascadeEventKind.EXTERNAL_STYLESHEET_INLINED]);
  });

  test("accepts absolute paths", () => {
    const doc = HtmlDocument.parse(`<link rel="stylesheet" href="${join(tmpDir, "site.css")}">`);
    new ExternalStylesheetTransform("/elsewhere").apply(doc);
    expect(doc.styleSources().map((s) => s.text)).toEqual(["p{color:red}"]);
  });

  test("leaves unreadable links in place and reports them", () => {
    const { emitter, events } = recorder();
    const doc = HtmlDocument.parse('<link rel="stylesheet" href="missing.css">');

    new ExternalStylesheetTransform(tmpDir, emitter).apply(doc);

    expect(doc.stylesheetLinks().map((l) => l.href)).toEqual(["missing.css"]);
    expect(events.map((e) => e.kind)).toEqual([CascadeEventKind.EXTERNAL_STYLESHEET_FAILED]);
    expect(events[0]?.data).toEqual({ href: "missing.css", path: join(tmpDir, "missing.css") });
  });

  test("never fetches remote stylesheets", () => {
    const { emitter, events } = recorder();
    const doc = HtmlDocument.parse('<link rel="stylesheet" href="https://example.com/a.css">');

    new ExternalStylesheetTransform(tmpDir, emitter).apply(doc);

    expect(doc.stylesheetLinks()).toHaveLength(1);
    expect(events.map((e) => e.message)).toEqual([
      "Skipped remote stylesheet https://example.com/a.css",
    ]);
  });

  test("reports links without an href", () => {
    const { emitter, events } = recorder();
    const doc = HtmlDocument.parse('<link rel="stylesheet">');

    new ExternalStylesheetTransform(tmpDir, emitter).apply(doc);

    expect(events.map((e) => e.kind)).toEqual([CascadeEventKind.EXTERNAL_STYLESHEET_FAILED]);
  });
});

describe("TransformRegistry", () => {
  test("applies transforms in registration order", () => {
    const order: string[] = [];
    const named = (name: string): Transform => ({
      apply(document) {
        order.push(name);
        return document;
      },
    });

    const registry = new TransformRegistry().register(named("a")).register(named("b"));
    const doc = HtmlDocument.parse("<p>x</p>");

    expect(registry.size).toBe(2);
    expect(registry.apply(doc)).toBe(doc);
    expect(order).toEqual(["a", "b"]);
  });
});

describe("documentPhases", () => {
  test("returns nothing when no phase is selected", () => {
    expect(documentPhases({ linkCss: false, inlineCss: false, removeInvisible: false })).toEqual([]);
  });

  test("orders link, cascade, then prune", () => {
    const phases = documentPhases({ linkCss: true, inlineCss: true, removeInvisible: true });
    expect(phases[0]).toBeInstanceOf(ExternalStylesheetTransform);
    expect(phases[1]).toBeInstanceOf(CascadeTransform);
    expect(phases[2]).toBeInstanceOf(InvisibleElementTransform);
    expect(phases).toHaveLength(3);
  });

  test("running every phase inlines, cascades and prunes", () => {
    const registry = new TransformRegistry();
    for (const phase of documentPhases(
      { linkCss: true, inlineCss: true, removeInvisible: true },
      { basePath: tmpDir },
    )) {
      registry.register(phase);
    }

    const doc = HtmlDocument.parse('<link rel="stylesheet" href="site.css"><p>x</p><div></div>');
    registry.apply(doc);

    expect(doc.serialize()).toBe('<html><body><p style="color: red">x</p></body></html>');
  });
});
