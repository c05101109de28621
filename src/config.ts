export class Config {
  static readonly LOG_LEVEL = envStr("HTML5W_LOG_LEVEL", "info", true);
  static readonly LOG_FORMAT = envStr("HTML5W_LOG_FORMAT", "json", true);
  static readonly STRICT_NODE_KINDS = envBool("HTML5W_STRICT_NODE_KINDS", true, true);
  static readonly CLOAK_EMAIL_ADDRESSES = envBool("HTML5W_CLOAK_EMAIL_ADDRESSES", false, true);
  static readonly PRETTY_PRINT = envBool("HTML5W_PRETTY_PRINT", true, true);
  static readonly INDENT_WIDTH = envNum("HTML5W_INDENT_WIDTH", 2, true);
  // Set but empty means no stylesheet link.
  static readonly STYLESHEET = envStr("HTML5W_STYLESHEET", "html5css3.css");
  static readonly DATE_PARSING = envBool("HTML5W_DATE_PARSING", true, true);
}

export function envStr(name: string, def?: string, treatEmptyAsUndefined = false): string {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v;
}

export function envNum(name: string, def?: number, treatEmptyAsUndefined = false): number {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const n = Number(v);
  if (isNaN(n)) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} is not a valid number: ${v}`);
  }
  return n;
}

export function envBool(name: string, def?: boolean, treatEmptyAsUndefined = false): boolean {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const vv = v.toLowerCase();
  if (["1", "true", "yes", "on"].includes(vv)) return true;
  if (["0", "false", "no", "off"].includes(vv)) return false;
  if (def !== undefined) return def;
  throw new Error(`Env var ${name} is not a valid boolean: ${v}`);
}
