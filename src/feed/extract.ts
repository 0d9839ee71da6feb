import { DOMParser } from "linkedom";

function normalizeWhitespace(text: string): string {
  return text
    .replace(/[ \t\f\v\r]+/g, " ")
    .replace(/ *\n[\n ]*/g, "\n")
    .trim();
}

const BLOCK_SELECTOR = "p, li, br, div, tr, td, th, h1, h2, h3, h4, h5, h6, pre, blockquote";

/** Renders a Reddit-flavoured HTML fragment (selftext_html, body_html) as plain text. */
export function htmlToText(html: string): string {
  const parser = new DOMParser();
  const doc = parser.parseFromString(`<html><body>${html}</body></html>`, "text/html");
  if (!doc?.body) {
    return "";
  }
  // Adjacent blocks would otherwise run together with no word boundary.
  for (const el of Array.from(doc.body.querySelectorAll(BLOCK_SELECTOR))) {
    el.parentNode?.insertBefore(doc.createTextNode("\n"), el.nextSibling);
  }
  return normalizeWhitespace(doc.body.textContent ?? "");
}

/**
 * Prefers the rendered HTML so link targets in markdown (which may contain ticker-like path
 * segments) are not treated as content.
 */
export function resolveBodyText(
  raw: string | null | undefined,
  html: string | null | undefined,
): string {
  if (html) {
    const text = htmlToText(html);
    if (text) {
      return text;
    }
  }
  return normalizeWhitespace(raw ?? "");
}
