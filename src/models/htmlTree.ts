export type HtmlAttrs = Record<string, string>;

/**
 * Element of the output tree.
 *
 * Text is stored the way it falls between elements: `text` is the run before
 * the first child and each child's `tail` is the run that follows it inside
 * the same parent.
 */
export type HtmlElement = {
  tag: string;
  attrs: HtmlAttrs;
  children: HtmlElement[];
  text: string;
  tail: string;
  parent: HtmlElement | null;
};

export function makeHtmlElement(tag: string, attrs?: HtmlAttrs): HtmlElement {
  return { tag, attrs: { ...(attrs || {}) }, children: [], text: "", tail: "", parent: null };
}

export function appendElement(parent: HtmlElement, tag: string, attrs?: HtmlAttrs): HtmlElement {
  const el = makeHtmlElement(tag, attrs);
  el.parent = parent;
  parent.children.push(el);
  return el;
}

export function lastChild(el: HtmlElement): HtmlElement | undefined {
  return el.children.length > 0 ? el.children[el.children.length - 1] : undefined;
}

export function findChild(el: HtmlElement, tag: string): HtmlElement | undefined {
  return el.children.find((c) => c.tag === tag);
}

export function appendText(el: HtmlElement, text: string): void {
  const last = lastChild(el);
  if (last) last.tail += text;
  else el.text += text;
}

/**
 * Removes `el` from its parent and puts its text and children in its place.
 * Its own tail follows the moved content.
 */
export function unwrapElement(el: HtmlElement): void {
  const parent = el.parent;
  if (!parent) throw new Error(`cannot unwrap the root element <${el.tag}>`);
  const index = parent.children.indexOf(el);
  if (index < 0) throw new Error(`<${el.tag}> is not a child of <${parent.tag}>`);
  const moved = el.children;
  if (index === 0) parent.text += el.text;
  else parent.children[index - 1].tail += el.text;
  if (moved.length > 0) {
    moved[moved.length - 1].tail += el.tail;
  } else if (index === 0) {
    parent.text += el.tail;
  } else {
    parent.children[index - 1].tail += el.tail;
  }
  for (const c of moved) c.parent = parent;
  parent.children.splice(index, 1, ...moved);
  el.children = [];
  el.parent = null;
}

export function htmlTextContent(el: HtmlElement): string {
  let out = el.text;
  for (const c of el.children) out += htmlTextContent(c) + c.tail;
  return out;
}

export function countElements(el: HtmlElement): number {
  let n = 1;
  for (const c of el.children) n += countElements(c);
  return n;
}
