import type { Token } from "./types";

const TOKEN_RE = /\s+|\S+/g;

/**
 * Splits `input` into maximal runs of whitespace and non-whitespace.
 * Punctuation stays attached to its word, so `"Michael,"` is one token.
 * Joining the token texts in order gives back `input` exactly.
 */
export function tokenize(input: string): Token[] {
  const out: Token[] = [];
  TOKEN_RE.lastIndex = 0;
  for (let m = TOKEN_RE.exec(input); m; m = TOKEN_RE.exec(input)) {
    out.push({ text: m[0], start: m.index, end: m.index + m[0].length });
  }
  return out;
}

export function isBlank(input: string | null): boolean {
  return (input ?? "").trim().length === 0;
}

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
