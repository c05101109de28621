import { unwrapElement, type HtmlElement } from "../models/htmlTree";
import { COLLAPSIBLE_TAGS } from "./nodeTable";

// Attributes such as a title class or an anchor id would be lost by unwrapping.
function isCollapsible(el: HtmlElement): boolean {
  return COLLAPSIBLE_TAGS.has(el.tag) && Object.keys(el.attrs).length === 0;
}

function collapseSoleChild(el: HtmlElement): number {
  let count = 0;
  while (el.children.length === 1 && el.text === "" && isCollapsible(el.children[0])) {
    unwrapElement(el.children[0]);
    count++;
  }
  return count;
}

/**
 * Dissolves every attribute-less collapsible wrapper that is the only child
 * of a parent without leading text. Children are settled before their parent, so the
 * result is a fixpoint and a second run changes nothing.
 * Returns the number of removed elements.
 */
export function normalizeTree(root: HtmlElement): number {
  let count = 0;
  for (const child of [...root.children]) count += normalizeTree(child);
  return count + collapseSoleChild(root);
}
