import { Config } from "./config";
import {
  checkFileConfigKeys,
  getFileConfigBool,
  getFileConfigNum,
  getFileConfigStr,
  loadConfig,
} from "./utils/fileConfig";

export type WriterSettings = {
  strictNodeKinds: boolean;
  cloakEmailAddresses: boolean;
  prettyPrint: boolean;
  indentWidth: number;
  /** Stylesheet linked from the head; empty for none. */
  stylesheet: string;
  dateParsing: boolean;
};

const SETTING_NAMES: readonly (keyof WriterSettings)[] = [
  "strictNodeKinds",
  "cloakEmailAddresses",
  "prettyPrint",
  "indentWidth",
  "stylesheet",
  "dateParsing",
];

export function defaultWriterSettings(): WriterSettings {
  return {
    strictNodeKinds: Config.STRICT_NODE_KINDS,
    cloakEmailAddresses: Config.CLOAK_EMAIL_ADDRESSES,
    prettyPrint: Config.PRETTY_PRINT,
    indentWidth: Config.INDENT_WIDTH,
    stylesheet: Config.STYLESHEET,
    dateParsing: Config.DATE_PARSING,
  };
}

export function loadWriterSettings(configPath: string): WriterSettings {
  const file = loadConfig(configPath);
  checkFileConfigKeys(file, SETTING_NAMES);
  const base = defaultWriterSettings();
  const indentWidth = getFileConfigNum(file, "indentWidth", base.indentWidth);
  if (!Number.isInteger(indentWidth) || indentWidth < 0) {
    throw new Error(`config param "indentWidth" must be a non-negative integer: ${indentWidth}`);
  }
  return {
    strictNodeKinds: getFileConfigBool(file, "strictNodeKinds", base.strictNodeKinds),
    cloakEmailAddresses: getFileConfigBool(file, "cloakEmailAddresses", base.cloakEmailAddresses),
    prettyPrint: getFileConfigBool(file, "prettyPrint", base.prettyPrint),
    indentWidth,
    stylesheet: getFileConfigStr(file, "stylesheet", base.stylesheet),
    dateParsing: getFileConfigBool(file, "dateParsing", base.dateParsing),
  };
}
