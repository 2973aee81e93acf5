/** A `<style>`-equivalent block found in the document. */
export interface StyleSource<E> {
  node: E;
  text: string;
}

/**
 * Tree capabilities the cascade needs from a document model. The core
 * never owns elements; it only edits attributes and removes nodes.
 */
export interface StyleDocument<E> {
  /** Every element, in document (pre-)order. */
  elements(): E[];
  tagName(element: E): string;
  getAttribute(element: E, name: string): string | undefined;
  setAttribute(element: E, name: string, value: string): void;
  removeAttribute(element: E, name: string): void;
  parent(element: E): E | undefined;
  /** True when the element has any child node, text and comments included. */
  hasContent(element: E): boolean;
  styleSources(): StyleSource<E>[];
  /** Detach a style-definition block. */
  detach(node: E): void;
  /** Delete an element together with its subtree. */
  remove(element: E): void;
  /** Throws when the selector cannot be evaluated. */
  matches(element: E, selectorText: string): boolean;
}
