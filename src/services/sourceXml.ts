import * as sax from "sax";
import type {
  DocBranch,
  DocClassedKind,
  DocCommonAttrs,
  DocEnumType,
  DocFieldKind,
  DocIrregularKind,
  DocNode,
  DocSimpleKind,
  DocTransparentKind,
} from "../models/docNode";

export class SourceXmlError extends Error {
  constructor(
    message: string,
    readonly line: number,
    readonly column: number,
  ) {
    super(`${message} (line ${line + 1}, column ${column + 1})`);
    this.name = "SourceXmlError";
  }
}

type PlainKind = DocSimpleKind | DocClassedKind | DocTransparentKind | DocFieldKind | DocIrregularKind;

type Builder<K extends PlainKind> = (attrs: DocCommonAttrs, children: DocNode[]) => DocBranch<K>;

function plain<K extends PlainKind>(kind: K): Builder<K> {
  return (attrs, children) => ({ kind, attrs, children });
}

const PLAIN_BUILDERS: { [K in PlainKind]: Builder<K> } = {
  paragraph: plain("paragraph"),
  emphasis: plain("emphasis"),
  strong: plain("strong"),
  literal: plain("literal"),
  abbreviation: plain("abbreviation"),
  acronym: plain("acronym"),
  subscript: plain("subscript"),
  superscript: plain("superscript"),
  title_reference: plain("title_reference"),
  literal_block: plain("literal_block"),
  bullet_list: plain("bullet_list"),
  list_item: plain("list_item"),
  definition_list: plain("definition_list"),
  term: plain("term"),
  definition: plain("definition"),
  table: plain("table"),
  tbody: plain("tbody"),
  row: plain("row"),
  figure: plain("figure"),
  caption: plain("caption"),
  transition: plain("transition"),
  option_list: plain("option_list"),
  option_list_item: plain("option_list_item"),
  option: plain("option"),
  option_string: plain("option_string"),
  topic: plain("topic"),
  sidebar: plain("sidebar"),
  compound: plain("compound"),
  container: plain("container"),
  note: plain("note"),
  tip: plain("tip"),
  warning: plain("warning"),
  document: plain("document"),
  tgroup: plain("tgroup"),
  colspec: plain("colspec"),
  definition_list_item: plain("definition_list_item"),
  author: plain("author"),
  organization: plain("organization"),
  contact: plain("contact"),
  version: plain("version"),
  status: plain("status"),
  copyright: plain("copyright"),
  date: plain("date"),
  section: plain("section"),
  title: plain("title"),
  subtitle: plain("subtitle"),
  docinfo: plain("docinfo"),
  thead: plain("thead"),
  block_quote: plain("block_quote"),
  attribution: plain("attribution"),
  line_block: plain("line_block"),
  line: plain("line"),
  option_group: plain("option_group"),
  description: plain("description"),
};

/** Kinds whose whitespace-only text is content rather than indentation. */
const TEXT_BEARING = new Set([
  "paragraph",
  "title",
  "subtitle",
  "term",
  "literal_block",
  "line",
  "attribution",
  "caption",
  "emphasis",
  "strong",
  "literal",
  "abbreviation",
  "acronym",
  "subscript",
  "superscript",
  "title_reference",
  "reference",
  "option_string",
  "option_argument",
  "author",
  "organization",
  "contact",
  "version",
  "status",
  "copyright",
  "date",
]);

const ENUM_TYPES: ReadonlySet<string> = new Set<DocEnumType>([
  "arabic",
  "loweralpha",
  "upperalpha",
  "lowerroman",
  "upperroman",
]);

function isPlainKind(name: string): name is PlainKind {
  return Object.prototype.hasOwnProperty.call(PLAIN_BUILDERS, name);
}

function isEnumType(value: string): value is DocEnumType {
  return ENUM_TYPES.has(value);
}

function splitNames(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const names = value.split(/\s+/).filter((s) => s.length > 0);
  return names.length > 0 ? names : undefined;
}

type Frame = {
  name: string;
  attrs: Record<string, string>;
  children: DocNode[];
};

export function parseSourceXml(text: string): DocNode {
  const parser = sax.parser(true, { trim: false, normalize: false });
  const stack: Frame[] = [];
  const result: { root?: DocNode } = {};

  const fail = (message: string): never => {
    throw new SourceXmlError(message, parser.line, parser.column);
  };

  const intAttr = (frame: Frame, name: string): number | undefined => {
    const v = frame.attrs[name];
    if (v === undefined) return undefined;
    if (!/^-?\d+$/.test(v.trim())) fail(`attribute ${name} of <${frame.name}> is not an integer: ${v}`);
    return parseInt(v, 10);
  };

  const build = (frame: Frame): DocNode => {
    const attrs: DocCommonAttrs = {};
    const ids = splitNames(frame.attrs.ids);
    if (ids) attrs.ids = ids;
    const classes = splitNames(frame.attrs.classes);
    if (classes) attrs.classes = classes;
    const children = frame.children;
    if (isPlainKind(frame.name)) return PLAIN_BUILDERS[frame.name](attrs, children);
    switch (frame.name) {
      case "image":
        return {
          kind: "image",
          attrs: {
            ...attrs,
            uri: frame.attrs.uri ?? "",
            alt: frame.attrs.alt,
            width: frame.attrs.width,
            height: frame.attrs.height,
          },
          children,
        };
      case "entry":
        return {
          kind: "entry",
          attrs: { ...attrs, morerows: intAttr(frame, "morerows"), morecols: intAttr(frame, "morecols") },
          children,
        };
      case "enumerated_list": {
        const enumtype = frame.attrs.enumtype;
        if (enumtype !== undefined && !isEnumType(enumtype)) fail(`unknown enumtype: ${enumtype}`);
        return {
          kind: "enumerated_list",
          attrs: {
            ...attrs,
            enumtype: enumtype !== undefined && isEnumType(enumtype) ? enumtype : undefined,
            start: intAttr(frame, "start"),
            prefix: frame.attrs.prefix,
            suffix: frame.attrs.suffix,
          },
          children,
        };
      }
      case "option_argument":
        return { kind: "option_argument", attrs: { ...attrs, delimiter: frame.attrs.delimiter }, children };
      case "reference":
        return {
          kind: "reference",
          attrs: { ...attrs, refuri: frame.attrs.refuri, refid: frame.attrs.refid, name: frame.attrs.name },
          children,
        };
      default:
        return { kind: "generic", name: frame.name, attrs: frame.attrs, children };
    }
  };

  const addText = (value: string) => {
    const top = stack[stack.length - 1];
    if (!top) {
      if (value.trim() !== "") fail("text outside the root element");
      return;
    }
    const last = top.children[top.children.length - 1];
    if (last && last.kind === "text") last.text += value;
    else top.children.push({ kind: "text", text: value });
  };

  parser.onerror = (err: Error) => {
    fail(err.message.split("\n")[0]);
  };
  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
    if (result.root) fail(`more than one root element: <${tag.name}>`);
    const attrs: Record<string, string> = {};
    for (const [k, v] of Object.entries(tag.attributes)) {
      attrs[k] = typeof v === "string" ? v : v.value;
    }
    stack.push({ name: tag.name, attrs, children: [] });
  };
  parser.ontext = addText;
  parser.oncdata = addText;
  parser.onclosetag = () => {
    const frame = stack.pop();
    if (!frame) return fail("unbalanced closing tag");
    if (!TEXT_BEARING.has(frame.name)) {
      frame.children = frame.children.filter((c) => c.kind !== "text" || c.text.trim() !== "");
    }
    const node = build(frame);
    const parent = stack[stack.length - 1];
    if (parent) parent.children.push(node);
    else result.root = node;
  };

  parser.write(text).close();
  const root = result.root;
  if (!root) return fail("no root element");
  if (root.kind !== "document") return fail(`root element must be <document>, not <${rootName(root)}>`);
  return root;
}

function rootName(node: DocNode): string {
  return node.kind === "generic" ? node.name : node.kind;
}
