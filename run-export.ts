/**
 * Forum export runner.
 *
 * Reads an authored HTML file, applies the selected phases and writes any
 * of: processed HTML, forum BBCode, chat Markdown.
 *
 * Usage: npm run export -- -i <file> [-o out.html] [-b out.bbcode.html] [-m out.md] [-A] [-a|-l|-n|-v]
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import {
  CascadeEventEmitter,
  HtmlDocument,
  TransformRegistry,
  documentPhases,
  isWarning,
} from "./cascade/src/index.js";
import { htmlToBbcode, htmlToDiscordMarkdown } from "./exporters/src/index.js";

export interface ExportOptions {
  inFile: string;
  outHtmlFile: string | undefined;
  outBbcodeFile: string | undefined;
  outMarkdownFile: string | undefined;
  linkCss: boolean;
  inlineCss: boolean;
  removeInvisible: boolean;
}

const USAGE =
  "Usage: npm run export -- -i <file> [-o html] [-b bbcode] [-m markdown] [-A] [-a] [-l] [-n] [-v]";

function withSuffix(path: string, suffix: string): string {
  const dot = path.lastIndexOf(".");
  const slash = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
  return (dot > slash ? path.slice(0, dot) : path) + suffix;
}

export function parseExportArgs(argv: string[]): ExportOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      "in-file": { type: "string", short: "i" },
      "out-html-file": { type: "string", short: "o" },
      "out-bbcode-file": { type: "string", short: "b" },
      "out-markdown-file": { type: "string", short: "m" },
      "auto-output": { type: "boolean", short: "A", default: false },
      "all-filters": { type: "boolean", short: "a", default: false },
      "link-css": { type: "boolean", short: "l", default: false },
      "inline-css": { type: "boolean", short: "n", default: false },
      "remove-invisible": { type: "boolean", short: "v", default: false },
    },
    strict: true,
  });

  const inFile = values["in-file"];
  if (inFile === undefined) {
    throw new Error(`Missing input file\n${USAGE}`);
  }

  const all = values["all-filters"] === true;
  const auto = values["auto-output"] === true;
  return {
    inFile,
    outHtmlFile: values["out-html-file"] ?? (auto ? withSuffix(inFile, ".out.html") : undefined),
    outBbcodeFile:
      values["out-bbcode-file"] ?? (auto ? withSuffix(inFile, ".out.bbcode.html") : undefined),
    outMarkdownFile: values["out-markdown-file"] ?? (auto ? withSuffix(inFile, ".out.md") : undefined),
    linkCss: all || values["link-css"] === true,
    inlineCss: all || values["inline-css"] === true,
    removeInvisible: all || values["remove-invisible"] === true,
  };
}

/** Runs the selected phases over `html` and returns the processed document. */
export function processHtml(
  html: string,
  options: Pick<ExportOptions, "linkCss" | "inlineCss" | "removeInvisible">,
  basePath: string,
  emitter?: CascadeEventEmitter,
): string {
  const registry = new TransformRegistry();
  for (const phase of documentPhases(options, { basePath, emitter })) {
    registry.register(phase);
  }
  if (registry.size === 0) return html;
  return registry.apply(HtmlDocument.parse(html)).serialize();
}

function main(): number {
  let options: ExportOptions;
  try {
    options = parseExportArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(err instanceof Error ? err.message : String(err));
    return 1;
  }

  if (!existsSync(options.inFile)) {
    console.error(`Error: Input HTML file not found at ${options.inFile}`);
    return 1;
  }

  const emitter = new CascadeEventEmitter();
  emitter.onEvent = (event) => {
    if (isWarning(event)) {
      console.warn(`Warning: ${event.message}`);
    } else {
      console.log(`  ${event.message}`);
    }
  };

  console.log(`Processing HTML from: ${options.inFile}`);
  const raw = readFileSync(options.inFile, "utf-8");
  const processed = processHtml(raw, options, dirname(options.inFile), emitter);
  emitter.close();

  if (options.outHtmlFile !== undefined) {
    writeFileSync(options.outHtmlFile, processed, "utf-8");
    console.log(`HTML written to ${options.outHtmlFile}`);
  }
  if (options.outBbcodeFile !== undefined) {
    writeFileSync(options.outBbcodeFile, htmlToBbcode(processed), "utf-8");
    console.log(`BBCode written to ${options.outBbcodeFile}`);
  }
  if (options.outMarkdownFile !== undefined) {
    writeFileSync(options.outMarkdownFile, htmlToDiscordMarkdown(processed), "utf-8");
    console.log(`Markdown written to ${options.outMarkdownFile}`);
  }
  return 0;
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  process.exitCode = main();
}
