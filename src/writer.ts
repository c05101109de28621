import type { Logger } from "pino";
import type { DocNode } from "./models/docNode";
import { appendElement, type HtmlElement } from "./models/htmlTree";
import { renderHtml } from "./services/render";
import { parseSourceXml } from "./services/sourceXml";
import { translateDocument, type Translation } from "./services/translator";
import type { SummaryEntry } from "./services/traversalContext";
import { defaultWriterSettings, type WriterSettings } from "./settings";
import { parseDateString, unavailableDateParser, type DateParser } from "./utils/dateParse";
import { createLogger } from "./utils/logger";

export const GENERATOR = "doctree-html5";

export type WriterOptions = {
  settings?: Partial<WriterSettings>;
  logger?: Logger;
  /** Replaces the built-in date parser; ignored when date parsing is off. */
  parseDate?: DateParser;
};

function fillHead(head: HtmlElement, summary: SummaryEntry[], settings: WriterSettings): void {
  appendElement(head, "meta", { charset: "utf-8" });
  appendElement(head, "meta", { name: "generator", content: GENERATOR });
  if (settings.stylesheet) {
    appendElement(head, "link", { rel: "stylesheet", href: settings.stylesheet });
  }
  const title = summary.find((e) => e.name === "title");
  if (title) appendElement(head, "title").text = title.content;
  for (const entry of summary) {
    if (entry.name === "title") continue;
    appendElement(head, "meta", { name: entry.name, content: entry.content });
  }
}

// An explicit undefined in the overrides keeps the default.
function mergeSettings(base: WriterSettings, overrides: Partial<WriterSettings>): WriterSettings {
  return {
    strictNodeKinds: overrides.strictNodeKinds ?? base.strictNodeKinds,
    cloakEmailAddresses: overrides.cloakEmailAddresses ?? base.cloakEmailAddresses,
    prettyPrint: overrides.prettyPrint ?? base.prettyPrint,
    indentWidth: overrides.indentWidth ?? base.indentWidth,
    stylesheet: overrides.stylesheet ?? base.stylesheet,
    dateParsing: overrides.dateParsing ?? base.dateParsing,
  };
}

/** Turns document trees into complete HTML5 documents. */
export class Writer {
  readonly settings: WriterSettings;
  private readonly logger: Logger;
  private readonly parseDate: DateParser;

  constructor(options: WriterOptions = {}) {
    this.settings = mergeSettings(defaultWriterSettings(), options.settings ?? {});
    this.logger = options.logger ?? createLogger({ file: "writer" });
    this.parseDate = this.settings.dateParsing
      ? (options.parseDate ?? parseDateString)
      : unavailableDateParser;
  }

  translate(document: DocNode): Translation {
    const translation = translateDocument(document, {
      parseDate: this.parseDate,
      strictNodeKinds: this.settings.strictNodeKinds,
      cloakEmailAddresses: this.settings.cloakEmailAddresses,
      logger: this.logger,
    });
    fillHead(translation.head, translation.summary, this.settings);
    return translation;
  }

  write(document: DocNode): string {
    const { root } = this.translate(document);
    return renderHtml(root, {
      prettyPrint: this.settings.prettyPrint,
      indentWidth: this.settings.indentWidth,
      cloakEmailAddresses: this.settings.cloakEmailAddresses,
    });
  }

  writeXml(xml: string): string {
    return this.write(parseSourceXml(xml));
  }
}
