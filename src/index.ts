export * from "./models/docNode";
export * from "./models/htmlTree";
export { DateParseError, parseDateString, unavailableDateParser, type DateParser } from "./utils/dateParse";
export { cloakEmail, cloakMailto, escapeHTML } from "./utils/format";
export { UnknownNodeKindError } from "./services/dispatch";
export { normalizeTree } from "./services/normalize";
export { DOCTYPE, renderHtml, serializeHtml, type RenderOptions } from "./services/render";
export { SourceXmlError, parseSourceXml } from "./services/sourceXml";
export {
  translateDocument,
  type TranslateOptions,
  type Translation,
  type VisitPhase,
} from "./services/translator";
export { StructureError, TraversalContext, type SummaryEntry } from "./services/traversalContext";
export { defaultWriterSettings, loadWriterSettings, type WriterSettings } from "./settings";
export { GENERATOR, Writer, type WriterOptions } from "./writer";
