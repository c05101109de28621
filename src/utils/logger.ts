import { Config } from "../config";
import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from "pino";
import { Writable } from "stream";

const options: LoggerOptions = {
  level: Config.LOG_LEVEL,
  timestamp: stdTimeFunctions.isoTime,
  base: undefined,
  formatters: {
    level(label) {
      return { level: label.toUpperCase() };
    },
  },
};

type LogObject = {
  level?: string;
  time?: string;
  msg?: string;
  file?: string;
  [key: string]: unknown;
};

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/** One human-readable line per pino record; anything unparsable is passed as is. */
export function formatLogLine(record: string): string {
  const text = record.trim();
  let obj: LogObject;
  try {
    obj = JSON.parse(text) as LogObject;
  } catch {
    return text + "\n";
  }
  const { level, time, msg, file, ...rest } = obj;
  const extras = Object.entries(rest)
    .map(([k, v]) => ` ${k}=${typeof v === "string" ? v : JSON.stringify(v)}`)
    .join("");
  const stamp = str(time).replace(/\..*/, "");
  const where = file ? `[${str(file)}]` : "-";
  return `${str(level).padEnd(5)} ${stamp} ${where} ${typeof msg === "string" ? msg : text}${extras}\n`;
}

// Logs go to stderr; stdout carries rendered pages.
class SimpleLineStream extends Writable {
  _write(chunk: Buffer, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const text = chunk.toString("utf8");
    if (text.trim().length > 0) process.stderr.write(formatLogLine(text));
    callback();
  }
}

function build(): Logger {
  if (Config.LOG_FORMAT === "simple") {
    return pino(options, new SimpleLineStream());
  }
  return pino(options, pino.destination(2));
}

type GlobalWithLogger = typeof globalThis & { __DOCTREE_HTML5_LOGGER__?: Logger };
const g = globalThis as GlobalWithLogger;

export const logger: Logger = g.__DOCTREE_HTML5_LOGGER__ ?? (g.__DOCTREE_HTML5_LOGGER__ = build());
export const createLogger = (bindings: Record<string, unknown>): Logger => logger.child(bindings);
