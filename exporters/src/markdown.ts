import { load } from "cheerio";
import TurndownService from "turndown";
import { bodyMarkup } from "./body.js";

const STRIKE_TAGS = new Set(["S", "STRIKE", "DEL"]);

function cellText(cell: Element): string {
  return (cell.textContent ?? "").replace(/\s+/g, " ").trim();
}

function createService(): TurndownService {
  const service = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
    bulletListMarker: "*",
    emDelimiter: "*",
    strongDelimiter: "**",
  });

  service.addRule("underline", {
    filter: ["u", "ins"],
    replacement: (content) => `__${content}__`,
  });

  service.addRule("strikethrough", {
    filter: (node) => STRIKE_TAGS.has(node.nodeName),
    replacement: (content) => `~~${content}~~`,
  });

  // Chat clients want a single space after the marker.
  service.addRule("listItem", {
    filter: "li",
    replacement: (content, node) => {
      const parent = node.parentNode;
      let prefix = "* ";
      if (parent !== null && parent.nodeName === "OL") {
        const items = Array.from(parent.childNodes).filter((child) => child.nodeName === "LI");
        prefix = `${items.indexOf(node) + 1}. `;
      }
      const body = content.replace(/^\n+/, "").replace(/\n+$/, "\n").replace(/\n/gm, "\n  ");
      const trailer = node.nextSibling !== null && !body.endsWith("\n") ? "\n" : "";
      return prefix + body + trailer;
    },
  });

  service.addRule("table", {
    filter: "table",
    replacement: (_content, node) => {
      const rows = Array.from(node.querySelectorAll("tr")).map(
        (row) => `| ${Array.from(row.querySelectorAll("td, th")).map(cellText).join(" | ")} |`,
      );
      const header = rows[0];
      if (header === undefined) return "";
      const columns = header.split("|").length - 2;
      const separator = `| ${Array.from({ length: columns }, () => "---").join(" | ")} |`;
      return `\n\n${[header, separator, ...rows.slice(1)].join("\n")}\n\n`;
    },
  });

  return service;
}

/** Converts the body of an HTML document to Discord-flavoured Markdown. */
export function htmlToDiscordMarkdown(html: string): string {
  return createService().turndown(bodyMarkup(load(html))).trim();
}
