import * as csstree from "css-tree";
import type { Declaration, RawRule } from "../types/index.js";
import { errorMessage, InlineStyleParseError, StylesheetParseError } from "../types/index.js";

interface ParsedTree {
  ast: csstree.CssNode;
  errors: string[];
}

function parseTree(source: string, context: "stylesheet" | "declarationList"): ParsedTree {
  const errors: string[] = [];
  const ast = csstree.parse(source, {
    context,
    parseRulePrelude: false,
    parseValue: false,
    onParseError(error) {
      errors.push(error.message);
    },
  });
  return { ast, errors };
}

function textOf(node: csstree.CssNode): string {
  return (node.type === "Raw" ? node.value : csstree.generate(node)).trim();
}

function toDeclaration(node: csstree.CssNode): Declaration | undefined {
  if (node.type !== "Declaration") return undefined;
  const property = node.property.trim().toLowerCase();
  const value = textOf(node.value);
  if (property === "" || value === "") return undefined;
  const important =
    node.important === true ||
    (typeof node.important === "string" && node.important.toLowerCase() === "important");
  return { property, value, important };
}

function declarationsOf(list: csstree.List<csstree.CssNode>): Declaration[] {
  const declarations: Declaration[] = [];
  list.forEach((node) => {
    const decl = toDeclaration(node);
    if (decl) declarations.push(decl);
  });
  return declarations;
}

/**
 * Parses one `<style>` block into its top-level style rules. At-rules and
 * their contents are skipped. Syntax errors css-tree recovers from drop only
 * the rule or declaration they occur in, and are passed to `onRecover`.
 * Throws `StylesheetParseError` only when the sheet cannot be parsed at all.
 */
export function parseStylesheet(
  source: string,
  onRecover?: (message: string) => void,
): RawRule[] {
  let tree: ParsedTree;
  try {
    tree = parseTree(source, "stylesheet");
  } catch (err: unknown) {
    throw new StylesheetParseError(
      `Could not parse stylesheet: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  for (const message of tree.errors) {
    onRecover?.(message);
  }
  if (tree.ast.type !== "StyleSheet") return [];

  const rules: RawRule[] = [];
  tree.ast.children.forEach((node) => {
    if (node.type !== "Rule") return;
    const selectorText = textOf(node.prelude);
    if (selectorText === "") return;
    rules.push({ selectorText, declarations: declarationsOf(node.block.children) });
  });
  return rules;
}

/** Parses the text of a `style` attribute. */
export function parseInlineStyle(source: string): Declaration[] {
  if (source.trim() === "") return [];

  let tree: ParsedTree;
  try {
    tree = parseTree(source, "declarationList");
  } catch (err: unknown) {
    throw new InlineStyleParseError(
      `Could not parse inline style "${source}": ${errorMessage(err)}`,
      { cause: err },
    );
  }
  const firstError = tree.errors[0];
  if (firstError !== undefined) {
    throw new InlineStyleParseError(`Could not parse inline style "${source}": ${firstError}`);
  }
  if (tree.ast.type !== "DeclarationList") return [];
  return declarationsOf(tree.ast.children);
}
