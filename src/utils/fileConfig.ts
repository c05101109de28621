import fs from "fs";
import path from "path";

export type FileConfig = Record<string, unknown>;

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export function loadConfig(configPath: string): FileConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`config file not found: ${resolved}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolved, "utf8"));
  } catch (e) {
    throw new Error(`invalid config JSON (${resolved}): ${String(e)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`invalid config JSON (${resolved}): top-level must be an object`);
  }
  return parsed as FileConfig;
}

/** Reads one parameter, falling back to `def` when it is absent. */
function readParam<T>(
  config: FileConfig,
  name: string,
  def: T,
  expected: string,
  accept: (value: unknown) => value is T,
): T {
  const value = config[name];
  if (value === undefined) return def;
  if (!accept(value)) {
    throw new Error(`config param "${name}" must be ${expected}, but got ${describeType(value)}`);
  }
  return value;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isFiniteNumber = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v);
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";

export function getFileConfigStr(config: FileConfig, name: string, def: string): string {
  return readParam(config, name, def, "string", isString);
}

export function getFileConfigNum(config: FileConfig, name: string, def: number): number {
  return readParam(config, name, def, "a finite number", isFiniteNumber);
}

export function getFileConfigBool(config: FileConfig, name: string, def: boolean): boolean {
  return readParam(config, name, def, "boolean", isBoolean);
}

/** Rejects parameters the caller does not know, so typos do not pass silently. */
export function checkFileConfigKeys(config: FileConfig, known: readonly string[]): void {
  const unknown = Object.keys(config).filter((k) => !known.includes(k));
  if (unknown.length > 0) {
    throw new Error(`unknown config params: ${unknown.join(", ")}`);
  }
}
