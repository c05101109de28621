import type { Logger } from "pino";
import type { DocElementNode, DocNode } from "../models/docNode";
import { appendElement, countElements, makeHtmlElement, type HtmlElement } from "../models/htmlTree";
import { parseDateString, type DateParser } from "../utils/dateParse";
import { createLogger } from "../utils/logger";
import { enterNode, leaveNode, type VisitEnv } from "./dispatch";
import { normalizeTree } from "./normalize";
import { StructureError, TraversalContext, type SummaryEntry } from "./traversalContext";

export type VisitPhase = "enter" | "leave";

export type TranslateOptions = {
  parseDate?: DateParser;
  strictNodeKinds?: boolean;
  cloakEmailAddresses?: boolean;
  logger?: Logger;
  /** Called after each enter and leave with the insertion stack depth at that point. */
  onVisit?: (phase: VisitPhase, node: DocNode, stackDepth: number) => void;
};

export type Translation = {
  root: HtmlElement;
  head: HtmlElement;
  body: HtmlElement;
  article: HtmlElement;
  summary: SummaryEntry[];
};

function walk(
  node: DocNode,
  parent: DocElementNode | null,
  env: VisitEnv,
  onVisit: TranslateOptions["onVisit"],
): void {
  enterNode(node, parent, env);
  onVisit?.("enter", node, env.ctx.stackDepth);
  if (node.kind !== "text") {
    for (const child of node.children) walk(child, node, env, onVisit);
  }
  leaveNode(node, parent, env);
  onVisit?.("leave", node, env.ctx.stackDepth);
}

/**
 * Translates a document tree into an html/head/body/article skeleton and
 * normalizes the result. Any failure aborts the whole translation.
 */
export function translateDocument(document: DocNode, options: TranslateOptions = {}): Translation {
  if (document.kind !== "document") {
    throw new StructureError(`expected a document node but got "${document.kind}"`);
  }
  const logger = options.logger ?? createLogger({ file: "translator" });
  const root = makeHtmlElement("html");
  const head = appendElement(root, "head");
  const body = appendElement(root, "body");
  const article = appendElement(body, "article");
  const ctx = new TraversalContext(article);
  const env: VisitEnv = {
    ctx,
    parseDate: options.parseDate ?? parseDateString,
    strictNodeKinds: options.strictNodeKinds ?? true,
    cloakEmailAddresses: options.cloakEmailAddresses ?? false,
    logger,
  };

  logger.debug("translation started");
  walk(document, null, env, options.onVisit);
  if (ctx.stackDepth !== 1) {
    throw new StructureError(`traversal ended inside <${ctx.current.tag}>`);
  }
  if (ctx.lineBlockIndent !== -1) {
    throw new StructureError(`traversal ended at line block depth ${ctx.lineBlockIndent}`);
  }
  const collapsed = normalizeTree(root);
  logger.debug(`translation finished: ${countElements(root)} elements, ${collapsed} collapsed`);
  return { root, head, body, article, summary: ctx.summary };
}
