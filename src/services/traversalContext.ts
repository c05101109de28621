import {
  appendElement,
  appendText,
  type HtmlAttrs,
  type HtmlElement,
} from "../models/htmlTree";
import { HEADER_TAG } from "./nodeTable";

/** The source tree does not have the shape the translator relies on. */
export class StructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructureError";
  }
}

/**
 * A section or the document itself. The header region and the tables in it
 * are created on first use and remembered here.
 */
export type SectionScope = {
  element: HtmlElement;
  header?: HtmlElement;
  headingGroup?: HtmlElement;
  docinfoBody?: HtmlElement;
};

export type QuoteFrame = { wrapper: HtmlElement; body: HtmlElement };

export type SummaryEntry = { name: string; content: string };

export class TraversalContext {
  private readonly stack: HtmlElement[];
  private readonly scopes: SectionScope[];
  private readonly quotes: QuoteFrame[] = [];
  private depth: number | undefined = undefined;
  private headerRowGroups = 0;
  readonly summary: SummaryEntry[] = [];
  lineBlockIndent = -1;

  constructor(root: HtmlElement) {
    this.stack = [root];
    this.scopes = [{ element: root }];
  }

  get root(): HtmlElement {
    return this.stack[0];
  }

  get current(): HtmlElement {
    return this.stack[this.stack.length - 1];
  }

  get stackDepth(): number {
    return this.stack.length;
  }

  get headingDepth(): number | undefined {
    return this.depth;
  }

  push(tag: string, attrs?: HtmlAttrs): HtmlElement {
    const el = appendElement(this.current, tag, attrs);
    this.stack.push(el);
    return el;
  }

  /** Makes an element that already sits somewhere in the tree the insertion point. */
  enter(el: HtmlElement): HtmlElement {
    this.stack.push(el);
    return el;
  }

  pop(): HtmlElement {
    if (this.stack.length <= 1) {
      throw new StructureError(`cannot leave the root element <${this.root.tag}>`);
    }
    const el = this.stack.pop();
    if (!el) throw new StructureError("insertion stack is empty");
    return el;
  }

  popExpect(expected: HtmlElement): void {
    const el = this.pop();
    if (el !== expected) {
      throw new StructureError(`expected to leave <${expected.tag}> but left <${el.tag}>`);
    }
  }

  appendText(text: string): void {
    appendText(this.current, text);
  }

  get scope(): SectionScope {
    return this.scopes[this.scopes.length - 1];
  }

  openScope(element: HtmlElement): void {
    this.scopes.push({ element });
  }

  closeScope(element: HtmlElement): void {
    if (this.scopes.length <= 1 || this.scope.element !== element) {
      throw new StructureError(`section scope mismatch at <${element.tag}>`);
    }
    this.scopes.pop();
  }

  localHeader(): HtmlElement {
    const scope = this.scope;
    if (!scope.header) scope.header = appendElement(scope.element, HEADER_TAG);
    return scope.header;
  }

  localDocinfo(): HtmlElement {
    const scope = this.scope;
    if (!scope.docinfoBody) {
      scope.docinfoBody = appendElement(appendElement(this.localHeader(), "table"), "tbody");
    }
    return scope.docinfoBody;
  }

  /** Depth for a new title: 1 for the first title seen, one deeper after that. */
  nextHeadingDepth(): number {
    this.depth = this.depth === undefined ? 1 : this.depth + 1;
    return this.depth;
  }

  leaveHeadingLevel(): void {
    if (this.depth === undefined) {
      throw new StructureError("section closed before any title was seen");
    }
    if (this.depth <= 0) {
      throw new StructureError("heading depth would drop below zero");
    }
    this.depth -= 1;
  }

  openQuote(frame: QuoteFrame): void {
    this.quotes.push(frame);
  }

  get quote(): QuoteFrame | undefined {
    return this.quotes.length > 0 ? this.quotes[this.quotes.length - 1] : undefined;
  }

  closeQuote(): QuoteFrame {
    const frame = this.quotes.pop();
    if (!frame) throw new StructureError("no block quote is open");
    return frame;
  }

  /** True while any header row group is open; nested tables leave the outer flag intact. */
  get inHeaderRow(): boolean {
    return this.headerRowGroups > 0;
  }

  enterHeaderRows(): void {
    this.headerRowGroups += 1;
  }

  leaveHeaderRows(): void {
    if (this.headerRowGroups <= 0) throw new StructureError("no header row group is open");
    this.headerRowGroups -= 1;
  }

  record(name: string, content: string): void {
    this.summary.push({ name, content });
  }
}
