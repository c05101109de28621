export function escapeHTML(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Hides the address of a mailto URI from harvesters with a URL octet reference. */
export function cloakMailto(uri: string): string {
  return uri.replace(/@/g, "%40");
}

/**
 * Wraps at-signs and periods of an e-mail address in spans.
 * The input is already escaped, with "@" encoded as "&#64;".
 */
export function cloakEmail(escapedAddr: string): string {
  return escapedAddr
    .replace(/&#64;/g, "<span>&#64;</span>")
    .replace(/\./g, "<span>&#46;</span>");
}

export function padNum(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}
