import type { Logger } from "pino";
import {
  docTextContent,
  type DocCommonAttrs,
  type DocElementNode,
  type DocEntryNode,
  type DocEnumeratedListNode,
  type DocFieldKind,
  type DocGenericNode,
  type DocNode,
  type DocNodeOf,
  type DocReferenceNode,
} from "../models/docNode";
import { appendElement, lastChild, type HtmlAttrs } from "../models/htmlTree";
import { DateParseError, type DateParser } from "../utils/dateParse";
import { cloakMailto } from "../utils/format";
import {
  CITATION_TAG,
  CLASSED_ELEMENT_TAG,
  ENUMERATION_STYLES,
  FIELD_ELEMENTS,
  HEADING_GROUP_TAG,
  LINE_INDENT_UNIT,
  MAX_HEADING_LEVEL,
  QUOTE_BODY_TAG,
  QUOTE_WRAPPER_CLASS,
  QUOTE_WRAPPER_TAG,
  SECTION_TAG,
  SIMPLE_ELEMENTS,
  headingTag,
  isClassedNode,
  isFieldNode,
  isSimpleNode,
  isTransparentNode,
  type SimpleTableKind,
} from "./nodeTable";
import { StructureError, type TraversalContext } from "./traversalContext";

export class UnknownNodeKindError extends Error {
  constructor(readonly nodeName: string) {
    super(`no translation for node "${nodeName}"`);
    this.name = "UnknownNodeKindError";
  }
}

export type VisitEnv = {
  ctx: TraversalContext;
  parseDate: DateParser;
  strictNodeKinds: boolean;
  cloakEmailAddresses: boolean;
  logger: Logger;
};

type Parent = DocElementNode | null;

function commonAttrs(attrs: DocCommonAttrs | undefined, className?: string): HtmlAttrs {
  const out: HtmlAttrs = {};
  const ids = attrs?.ids ?? [];
  if (ids.length > 0) out.id = ids[0];
  const classes = [...(className ? [className] : []), ...(attrs?.classes ?? [])];
  if (classes.length > 0) out.class = classes.join(" ");
  return out;
}

function enterSimple(node: DocNodeOf<SimpleTableKind>, env: VisitEnv): void {
  const spec = SIMPLE_ELEMENTS[node.kind];
  const attrs: HtmlAttrs = {};
  if (spec.rename && node.attrs) {
    const values: Record<string, unknown> = { ...node.attrs };
    for (const [from, to] of Object.entries(spec.rename)) {
      const v = values[from];
      if (typeof v === "string" && v !== "") attrs[to] = v;
      else if (typeof v === "number") attrs[to] = String(v);
    }
  }
  env.ctx.push(spec.tag, { ...attrs, ...commonAttrs(node.attrs, spec.className) });
}

function isHeadingOwner(parent: Parent): boolean {
  return parent === null || parent.kind === "document" || parent.kind === "section";
}

function headingAttrs(depth: number): HtmlAttrs {
  return depth > MAX_HEADING_LEVEL ? { "aria-level": String(depth) } : {};
}

/** Titles and subtitles of topics, sidebars and other containers; they never touch heading depth. */
function enterContainerHeading(kind: "title" | "subtitle", parent: Parent, env: VisitEnv): void {
  if (kind === "title" && parent?.kind === "table") {
    env.ctx.push("caption");
    return;
  }
  const owner = parent?.kind === "generic" ? parent.name : parent?.kind;
  env.ctx.push("p", { class: `${owner}-${kind}` });
}

function enterTitle(node: DocNodeOf<"title">, parent: Parent, env: VisitEnv): void {
  const ctx = env.ctx;
  if (!isHeadingOwner(parent)) return enterContainerHeading("title", parent, env);
  const depth = ctx.nextHeadingDepth();
  const group = appendElement(ctx.localHeader(), HEADING_GROUP_TAG);
  ctx.scope.headingGroup = group;
  ctx.enter(appendElement(group, headingTag(depth), headingAttrs(depth)));
  if (parent === null || parent.kind === "document") {
    ctx.record("title", docTextContent(node).trim());
  }
}

function enterSubtitle(parent: Parent, env: VisitEnv): void {
  if (!isHeadingOwner(parent)) return enterContainerHeading("subtitle", parent, env);
  const ctx = env.ctx;
  const group = ctx.scope.headingGroup;
  const depth = ctx.headingDepth;
  if (!group || depth === undefined) {
    throw new StructureError("subtitle without a preceding title in the same section");
  }
  ctx.enter(appendElement(group, headingTag(depth + 1), headingAttrs(depth + 1)));
}

function enterSection(node: DocNodeOf<"section">, env: VisitEnv): void {
  const el = env.ctx.push(SECTION_TAG, commonAttrs(node.attrs));
  env.ctx.openScope(el);
}

function leaveSection(env: VisitEnv): void {
  const ctx = env.ctx;
  ctx.leaveHeadingLevel();
  const el = ctx.current;
  ctx.closeScope(el);
  ctx.popExpect(el);
}

function enterField(node: DocNodeOf<DocFieldKind>, env: VisitEnv): void {
  const ctx = env.ctx;
  const spec = FIELD_ELEMENTS[node.kind];
  const row = appendElement(ctx.localDocinfo(), "tr");
  appendElement(row, "th").text = spec.label;
  ctx.enter(appendElement(row, "td", { itemprop: spec.itemprop }));
  if (node.kind !== "date") return;
  const time = ctx.push("time");
  const raw = docTextContent(node);
  try {
    time.attrs.datetime = env.parseDate(raw);
  } catch (e) {
    if (!(e instanceof DateParseError)) throw e;
    env.logger.debug(`no timestamp for date field: ${e.message}`);
  }
}

function leaveField(node: DocNodeOf<DocFieldKind>, env: VisitEnv): void {
  const ctx = env.ctx;
  let timestamp: string | undefined;
  if (node.kind === "date") timestamp = ctx.pop().attrs.datetime;
  ctx.pop();
  ctx.record(FIELD_ELEMENTS[node.kind].itemprop, timestamp ?? docTextContent(node).trim());
}

function enterEntry(node: DocEntryNode, env: VisitEnv): void {
  const attrs = commonAttrs(node.attrs);
  const rowspan = (node.attrs?.morerows ?? 0) + 1;
  const colspan = (node.attrs?.morecols ?? 0) + 1;
  if (rowspan > 1) attrs.rowspan = String(rowspan);
  if (colspan > 1) attrs.colspan = String(colspan);
  env.ctx.push(env.ctx.inHeaderRow ? "th" : "td", attrs);
}

function enterBlockQuote(node: DocNodeOf<"block_quote">, env: VisitEnv): void {
  const ctx = env.ctx;
  const wrapper = ctx.push(QUOTE_WRAPPER_TAG, commonAttrs(node.attrs, QUOTE_WRAPPER_CLASS));
  const body = ctx.push(QUOTE_BODY_TAG);
  ctx.openQuote({ wrapper, body });
}

function leaveBlockQuote(env: VisitEnv): void {
  const ctx = env.ctx;
  const { wrapper, body } = ctx.closeQuote();
  if (lastChild(wrapper)?.tag !== CITATION_TAG) ctx.popExpect(body);
  ctx.popExpect(wrapper);
}

function enterAttribution(env: VisitEnv): void {
  const ctx = env.ctx;
  const frame = ctx.quote;
  if (!frame) throw new StructureError("attribution outside a block quote");
  ctx.popExpect(frame.body);
  ctx.push(CITATION_TAG);
}

function enterEnumeratedList(node: DocEnumeratedListNode, env: VisitEnv): void {
  const attrs = commonAttrs(node.attrs);
  const style = ENUMERATION_STYLES[node.attrs?.enumtype ?? "arabic"];
  if (style) attrs.style = style;
  const start = node.attrs?.start;
  if (start !== undefined && start !== 1) attrs.start = String(start);
  env.ctx.push("ol", attrs);
}

function enterOptionArgument(node: DocNodeOf<"option_argument">, env: VisitEnv): void {
  const ctx = env.ctx;
  ctx.push("span", { class: "delimiter" }).text = node.attrs?.delimiter ?? " ";
  ctx.pop();
  ctx.push("var");
}

function enterReference(node: DocReferenceNode, env: VisitEnv): void {
  const attrs: HtmlAttrs = {};
  const refuri = node.attrs?.refuri;
  const refid = node.attrs?.refid;
  if (refuri) {
    attrs.href =
      env.cloakEmailAddresses && refuri.startsWith("mailto:") ? cloakMailto(refuri) : refuri;
  } else if (refid) {
    attrs.href = `#${refid}`;
  }
  env.ctx.push("a", { ...attrs, ...commonAttrs(node.attrs) });
}

function enterLine(env: VisitEnv): void {
  const indent = Math.max(env.ctx.lineBlockIndent, 0);
  if (indent > 0) env.ctx.appendText(LINE_INDENT_UNIT.repeat(indent));
}

function leaveLine(env: VisitEnv): void {
  env.ctx.push("br");
  env.ctx.pop();
}

function passGeneric(node: DocGenericNode, env: VisitEnv): void {
  if (env.strictNodeKinds) throw new UnknownNodeKindError(node.name);
  env.logger.warn(`passing through unknown node "${node.name}"`);
}

export function enterNode(node: DocNode, parent: Parent, env: VisitEnv): void {
  const ctx = env.ctx;
  if (isSimpleNode(node)) return enterSimple(node, env);
  if (isClassedNode(node)) {
    ctx.push(CLASSED_ELEMENT_TAG, commonAttrs(node.attrs, node.kind));
    return;
  }
  if (isTransparentNode(node)) return;
  if (isFieldNode(node)) return enterField(node, env);
  switch (node.kind) {
    case "text":
      ctx.appendText(node.text);
      return;
    case "title":
      return enterTitle(node, parent, env);
    case "subtitle":
      return enterSubtitle(parent, env);
    case "section":
      return enterSection(node, env);
    case "docinfo":
      ctx.localHeader().attrs.itemscope = "";
      return;
    case "thead":
      ctx.push("thead");
      ctx.enterHeaderRows();
      return;
    case "entry":
      return enterEntry(node, env);
    case "block_quote":
      return enterBlockQuote(node, env);
    case "attribution":
      return enterAttribution(env);
    case "enumerated_list":
      return enterEnumeratedList(node, env);
    case "option_argument":
      return enterOptionArgument(node, env);
    case "option_group":
      ctx.push("th");
      ctx.push("kbd");
      return;
    case "description":
      ctx.push("td");
      return;
    case "line_block":
      ctx.lineBlockIndent += 1;
      return;
    case "line":
      return enterLine(env);
    case "reference":
      return enterReference(node, env);
    case "generic":
      return passGeneric(node, env);
    default: {
      const _exhaustive: never = node;
      throw new UnknownNodeKindError(String(_exhaustive));
    }
  }
}

export function leaveNode(node: DocNode, parent: Parent, env: VisitEnv): void {
  const ctx = env.ctx;
  if (isSimpleNode(node) || isClassedNode(node)) {
    ctx.pop();
    return;
  }
  if (isTransparentNode(node)) return;
  if (isFieldNode(node)) return leaveField(node, env);
  switch (node.kind) {
    case "text":
    case "docinfo":
    case "generic":
      return;
    case "title":
    case "subtitle":
    case "attribution":
    case "entry":
    case "enumerated_list":
    case "option_argument":
    case "description":
    case "reference":
      ctx.pop();
      return;
    case "section":
      return leaveSection(env);
    case "thead":
      ctx.pop();
      ctx.leaveHeaderRows();
      return;
    case "block_quote":
      return leaveBlockQuote(env);
    case "option_group":
      ctx.pop();
      ctx.pop();
      return;
    case "line_block":
      if (ctx.lineBlockIndent < 0) throw new StructureError("line block closed twice");
      ctx.lineBlockIndent -= 1;
      return;
    case "line":
      return leaveLine(env);
    default: {
      const _exhaustive: never = node;
      throw new UnknownNodeKindError(String(_exhaustive));
    }
  }
}
