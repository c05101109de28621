export type DocCommonAttrs = { ids?: string[]; classes?: string[] };

export type DocImageAttrs = DocCommonAttrs & {
  uri: string;
  alt?: string;
  width?: string;
  height?: string;
};

export type DocEntryAttrs = DocCommonAttrs & { morerows?: number; morecols?: number };

export type DocEnumType = "arabic" | "loweralpha" | "upperalpha" | "lowerroman" | "upperroman";

export type DocEnumeratedListAttrs = DocCommonAttrs & {
  enumtype?: DocEnumType;
  start?: number;
  prefix?: string;
  suffix?: string;
};

export type DocOptionArgumentAttrs = DocCommonAttrs & { delimiter?: string };

export type DocReferenceAttrs = DocCommonAttrs & { refuri?: string; refid?: string; name?: string };

export type DocTextNode = { kind: "text"; text: string };

export type DocBranch<K extends string, A extends object = DocCommonAttrs> = {
  kind: K;
  attrs?: A;
  children: DocNode[];
};

type Branches<K extends string> = K extends string ? DocBranch<K> : never;

export type DocSimpleKind =
  | "paragraph"
  | "emphasis"
  | "strong"
  | "literal"
  | "abbreviation"
  | "acronym"
  | "subscript"
  | "superscript"
  | "title_reference"
  | "literal_block"
  | "bullet_list"
  | "list_item"
  | "definition_list"
  | "term"
  | "definition"
  | "table"
  | "tbody"
  | "row"
  | "figure"
  | "caption"
  | "transition"
  | "option_list"
  | "option_list_item"
  | "option"
  | "option_string";

export type DocClassedKind =
  | "topic"
  | "sidebar"
  | "compound"
  | "container"
  | "note"
  | "tip"
  | "warning";

export type DocTransparentKind = "document" | "tgroup" | "colspec" | "definition_list_item";

export type DocFieldKind =
  | "author"
  | "organization"
  | "contact"
  | "version"
  | "status"
  | "copyright"
  | "date";

export type DocIrregularKind =
  | "section"
  | "title"
  | "subtitle"
  | "docinfo"
  | "thead"
  | "block_quote"
  | "attribution"
  | "line_block"
  | "line"
  | "option_group"
  | "description";

export type DocImageNode = { kind: "image"; attrs: DocImageAttrs; children: DocNode[] };
export type DocEntryNode = DocBranch<"entry", DocEntryAttrs>;
export type DocEnumeratedListNode = DocBranch<"enumerated_list", DocEnumeratedListAttrs>;
export type DocOptionArgumentNode = DocBranch<"option_argument", DocOptionArgumentAttrs>;
export type DocReferenceNode = DocBranch<"reference", DocReferenceAttrs>;

/** An element the loader could not map onto a known kind. */
export type DocGenericNode = {
  kind: "generic";
  name: string;
  attrs?: Record<string, string>;
  children: DocNode[];
};

export type DocElementNode =
  | Branches<DocSimpleKind>
  | Branches<DocClassedKind>
  | Branches<DocTransparentKind>
  | Branches<DocFieldKind>
  | Branches<DocIrregularKind>
  | DocImageNode
  | DocEntryNode
  | DocEnumeratedListNode
  | DocOptionArgumentNode
  | DocReferenceNode
  | DocGenericNode;

export type DocNode = DocTextNode | DocElementNode;

export type DocKind = DocNode["kind"];

export type DocNodeOf<K extends DocKind> = Extract<DocNode, { kind: K }>;

export function docTextContent(node: DocNode): string {
  if (node.kind === "text") return node.text;
  let out = "";
  for (const c of node.children) out += docTextContent(c);
  return out;
}
