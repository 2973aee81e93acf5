import { describe, test, expect } from "vitest";
import { applyCascade } from "../../src/cascade/apply.js";
import { HtmlDocument } from "../../src/document/html-document.js";
import { CascadeEventEmitter } from "../../src/events/emitter.js";
import type { CascadeEvent } from "../../src/types/index.js";
import { CascadeEventKind } from "../../src/types/index.js";

function styleOf(doc: HtmlDocument, selector: string): string | undefined {
  const element = doc.query(selector)[0];
  return element === undefined ? undefined : doc.getAttribute(element, "style");
}

function cascade(html: string): HtmlDocument {
  const doc = HtmlDocument.parse(html);
  applyCascade(doc);
  return doc;
}

describe("applyCascade", () => {
  test("merges a stylesheet rule with inline style and removes the style block", () => {
    const doc = cascade(
      '<style>.note{color:red}</style><p class="note" style="font-weight:bold">Hi</p>',
    );
    expect(styleOf(doc, "p")).toBe("font-weight: bold; color: red");
    expect(doc.query("style")).toHaveLength(0);
    expect(doc.serialize()).toBe(
      '<html><head></head><body><p class="note" style="font-weight: bold; color: red">Hi</p></body></html>',
    );
  });

  test("later rule wins between equal specificities across style blocks", () => {
    const doc = cascade(
      '<style>.x{color:red}</style><style>.x{color:green}</style><p class="x">t</p>',
    );
    expect(styleOf(doc, "p")).toBe("color: green");
  });

  test("inline style is kept over an important type rule", () => {
    const doc = cascade(
      '<style>div{color:red !important}</style><div style="color: blue">x</div>',
    );
    expect(styleOf(doc, "div")).toBe("color: blue");
  });

  test("an important rule with id specificity overrides inline style", () => {
    const doc = cascade(
      '<style>#box{color:red !important}</style><div id="box" style="color: blue">x</div>',
    );
    expect(styleOf(doc, "div")).toBe("color: red !important");
  });

  test("children inherit from the written style of their parent", () => {
    const doc = cascade('<div style="color: red"><span>t</span></div>');
    expect(styleOf(doc, "span")).toBe("color: red");
  });

  test("a matching rule beats the inherited value", () => {
    const doc = cascade(
      '<style>body *{color:blue}</style><div style="color: red"><span>t</span></div>',
    );
    expect(styleOf(doc, "div")).toBe("color: red");
    expect(styleOf(doc, "span")).toBe("color: blue");
  });

  test("inheritance follows values that were themselves cascaded", () => {
    const doc = cascade(
      '<style>.c{font-family:serif}</style><div class="c"><p><em>x</em></p></div>',
    );
    expect(styleOf(doc, "p")).toBe("font-family: serif");
    expect(styleOf(doc, "em")).toBe("font-family: serif");
  });

  test("structural pseudo-classes match, dynamic ones are dropped", () => {
    const doc = cascade(
      "<style>li:nth-child(2){color:red} li:hover{color:blue}</style><ul><li>a</li><li>b</li></ul>",
    );
    const items = doc.query("li");
    expect(items.map((li) => doc.getAttribute(li, "style"))).toEqual([undefined, "color: red"]);
  });

  test("removes a style attribute that resolves to nothing", () => {
    const doc = cascade('<p style="">x</p>');
    expect(styleOf(doc, "p")).toBeUndefined();
  });

  test("running twice leaves the tree unchanged", () => {
    const once = cascade(
      '<style>.note{color:red} p{margin:0 !important}</style>' +
        '<div style="text-align: center"><p class="note" style="font-weight:bold">Hi <b>there</b></p></div>',
    ).serialize();
    const twice = cascade(once).serialize();
    expect(twice).toBe(once);
  });

  test("reports and recovers from malformed input", () => {
    const emitter = new CascadeEventEmitter();
    const events: CascadeEvent[] = [];
    emitter.subscribe((event) => events.push(event));

    const doc = HtmlDocument.parse(
      "<style>.a{color red}</style><style>.b{color:green}</style>" +
        '<p class="a b" style="color red">x</p>',
    );
    const result = applyCascade(doc, {}, emitter);

    expect(styleOf(doc, "p")).toBe("color: green");
    expect(result.rules).toHaveLength(1);
    expect(result.stylesheetsRemoved).toBe(2);
    expect(events.map((e) => e.kind)).toEqual([
      CascadeEventKind.STYLESHEET_RECOVERED,
      CascadeEventKind.STYLESHEET_COLLECTED,
      CascadeEventKind.STYLESHEET_COLLECTED,
      CascadeEventKind.INLINE_STYLE_PARSE_FAILED,
    ]);
  });

  test("valid rules beside a malformed declaration still apply", () => {
    const doc = HtmlDocument.parse('<style>.a{color:red} .b{color blue}</style><p class="a b">x</p>');
    applyCascade(doc);
    expect(styleOf(doc, "p")).toBe("color: red");
  });

  test("an attribute selector on id weighs like a class", () => {
    const doc = HtmlDocument.parse(
      '<style>.a.b{color:red} [id="x"]{color:blue}</style><p id="x" class="a b">x</p>',
    );
    applyCascade(doc);
    expect(styleOf(doc, "p")).toBe("color: red");
  });

  test("a selector the matcher rejects is reported once and never matches", () => {
    const emitter = new CascadeEventEmitter();
    const events: CascadeEvent[] = [];
    emitter.subscribe((event) => events.push(event));

    const doc = HtmlDocument.parse("<style>p!x{color:red}</style><p>a</p><p>b</p>");
    applyCascade(doc, {}, emitter);

    expect(doc.query("p").map((p) => doc.getAttribute(p, "style"))).toEqual([undefined, undefined]);
    expect(events.filter((e) => e.kind === CascadeEventKind.SELECTOR_MATCH_FAILED)).toHaveLength(1);
  });

  test("counts the elements that received a style", () => {
    const doc = HtmlDocument.parse('<style>p{color:red}</style><p>a</p><p>b</p><div>c</div>');
    expect(applyCascade(doc).elementsStyled).toBe(2);
  });
});
