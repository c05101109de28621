import type {
  DocClassedKind,
  DocEnumType,
  DocFieldKind,
  DocNode,
  DocNodeOf,
  DocSimpleKind,
  DocTransparentKind,
} from "../models/docNode";

export type SimpleTableKind = DocSimpleKind | "image";

export type SimpleElementSpec = {
  tag: string;
  className?: string;
  /** Source attribute name to output attribute name. */
  rename?: Record<string, string>;
};

export const SIMPLE_ELEMENTS: Record<SimpleTableKind, SimpleElementSpec> = {
  paragraph: { tag: "p" },
  emphasis: { tag: "em" },
  strong: { tag: "strong" },
  literal: { tag: "code" },
  abbreviation: { tag: "abbr" },
  acronym: { tag: "abbr", className: "acronym" },
  subscript: { tag: "sub" },
  superscript: { tag: "sup" },
  title_reference: { tag: "cite" },
  literal_block: { tag: "pre" },
  bullet_list: { tag: "ul" },
  list_item: { tag: "li" },
  definition_list: { tag: "dl" },
  term: { tag: "dt" },
  definition: { tag: "dd" },
  table: { tag: "table" },
  tbody: { tag: "tbody" },
  row: { tag: "tr" },
  figure: { tag: "figure" },
  caption: { tag: "figcaption" },
  transition: { tag: "hr" },
  image: { tag: "img", rename: { uri: "src", alt: "alt", width: "width", height: "height" } },
  option_list: { tag: "table", className: "option-list" },
  option_list_item: { tag: "tr" },
  option: { tag: "span", className: "option" },
  option_string: { tag: "span", className: "option-string" },
};

export const CLASSED_ELEMENTS: Record<DocClassedKind, true> = {
  topic: true,
  sidebar: true,
  compound: true,
  container: true,
  note: true,
  tip: true,
  warning: true,
};

export const CLASSED_ELEMENT_TAG = "div";

export const TRANSPARENT_ELEMENTS: Record<DocTransparentKind, true> = {
  document: true,
  tgroup: true,
  colspec: true,
  definition_list_item: true,
};

export type FieldSpec = { label: string; itemprop: string };

export const FIELD_ELEMENTS: Record<DocFieldKind, FieldSpec> = {
  author: { label: "Author", itemprop: "author" },
  organization: { label: "Organization", itemprop: "organization" },
  contact: { label: "Contact", itemprop: "contact" },
  version: { label: "Version", itemprop: "version" },
  status: { label: "Status", itemprop: "status" },
  copyright: { label: "Copyright", itemprop: "copyright" },
  date: { label: "Date", itemprop: "date" },
};

export const ENUMERATION_STYLES: Record<DocEnumType, string | undefined> = {
  arabic: undefined,
  loweralpha: "list-style-type: lower-alpha",
  upperalpha: "list-style-type: upper-alpha",
  lowerroman: "list-style-type: lower-roman",
  upperroman: "list-style-type: upper-roman",
};

export const MAX_HEADING_LEVEL = 6;
export const HEADER_TAG = "header";
export const HEADING_GROUP_TAG = "hgroup";
export const SECTION_TAG = "section";
export const QUOTE_WRAPPER_TAG = "figure";
export const QUOTE_WRAPPER_CLASS = "quote";
export const QUOTE_BODY_TAG = "blockquote";
export const CITATION_TAG = "figcaption";
export const LINE_INDENT_UNIT = "\u00a0".repeat(4);

/** Tags the normalization pass may dissolve into their parent. */
export const COLLAPSIBLE_TAGS: ReadonlySet<string> = new Set(["p"]);

export function isSimpleNode(node: DocNode): node is DocNodeOf<SimpleTableKind> {
  return Object.prototype.hasOwnProperty.call(SIMPLE_ELEMENTS, node.kind);
}

export function isClassedNode(node: DocNode): node is DocNodeOf<DocClassedKind> {
  return Object.prototype.hasOwnProperty.call(CLASSED_ELEMENTS, node.kind);
}

export function isTransparentNode(node: DocNode): node is DocNodeOf<DocTransparentKind> {
  return Object.prototype.hasOwnProperty.call(TRANSPARENT_ELEMENTS, node.kind);
}

export function isFieldNode(node: DocNode): node is DocNodeOf<DocFieldKind> {
  return Object.prototype.hasOwnProperty.call(FIELD_ELEMENTS, node.kind);
}

export function headingTag(depth: number): string {
  return `h${Math.min(Math.max(depth, 1), MAX_HEADING_LEVEL)}`;
}
