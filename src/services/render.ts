import type { HtmlAttrs, HtmlElement } from "../models/htmlTree";
import { cloakEmail, escapeHTML } from "../utils/format";

export const DOCTYPE = "<!doctype html>";

export type RenderOptions = {
  prettyPrint?: boolean;
  indentWidth?: number;
  cloakEmailAddresses?: boolean;
};

const VOID_TAGS = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "source",
  "track",
  "wbr",
]);

const PRESERVE_TAGS = new Set(["pre", "textarea", "script", "style"]);

const INLINE_TAGS = new Set([
  "a",
  "abbr",
  "b",
  "br",
  "cite",
  "code",
  "em",
  "i",
  "img",
  "kbd",
  "span",
  "strong",
  "sub",
  "sup",
  "time",
  "var",
]);

type RenderState = {
  pretty: boolean;
  indent: string;
  cloak: boolean;
};

function attrsToString(attrs: HtmlAttrs): string {
  let out = "";
  for (const [k, v] of Object.entries(attrs)) {
    out += v === "" ? ` ${k}` : ` ${k}="${escapeHTML(v)}"`;
  }
  return out;
}

function isMailtoLink(el: HtmlElement): boolean {
  return el.tag === "a" && (el.attrs.href ?? "").startsWith("mailto:");
}

function textToString(text: string, cloak: boolean): string {
  const escaped = escapeHTML(text);
  return cloak ? cloakEmail(escaped.replace(/@/g, "&#64;")) : escaped;
}

function hasBlockLayout(el: HtmlElement): boolean {
  return (
    el.children.length > 0 &&
    el.text === "" &&
    !INLINE_TAGS.has(el.tag) &&
    el.children.every((c) => c.tail === "" && !INLINE_TAGS.has(c.tag))
  );
}

function serialize(el: HtmlElement, level: number, state: RenderState, cloak: boolean): string {
  const open = `<${el.tag}${attrsToString(el.attrs)}>`;
  if (VOID_TAGS.has(el.tag)) return open;
  const close = `</${el.tag}>`;
  const inCloak = cloak || (state.cloak && isMailtoLink(el));
  const pretty = state.pretty && !PRESERVE_TAGS.has(el.tag);
  const childState = pretty ? state : { ...state, pretty: false };
  if (pretty && hasBlockLayout(el)) {
    const pad = state.indent.repeat(level + 1);
    let inner = "";
    for (const c of el.children) inner += `\n${pad}${serialize(c, level + 1, childState, inCloak)}`;
    return `${open}${inner}\n${state.indent.repeat(level)}${close}`;
  }
  let inner = textToString(el.text, inCloak);
  for (const c of el.children) {
    inner += serialize(c, level + 1, childState, inCloak) + textToString(c.tail, inCloak);
  }
  return open + inner + close;
}

export function serializeHtml(root: HtmlElement, options: RenderOptions = {}): string {
  const state: RenderState = {
    pretty: options.prettyPrint ?? true,
    indent: " ".repeat(options.indentWidth ?? 2),
    cloak: options.cloakEmailAddresses ?? false,
  };
  return serialize(root, 0, state, false);
}

/** The doctype line followed by the serialized tree. */
export function renderHtml(root: HtmlElement, options: RenderOptions = {}): string {
  return `${DOCTYPE}\n${serializeHtml(root, options)}\n`;
}
