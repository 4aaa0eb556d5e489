import { decodeHTML } from "entities";
import { TextDecoder } from "node:util";

const REMOVED_ELEMENTS = [
  "script",
  "style",
  "nav",
  "header",
  "footer",
  "aside",
  "iframe",
  "noscript",
];

const BLOCK_TAG =
  /<\/?(?:p|div|br|li|ul|ol|tr|td|th|table|section|article|main|h[1-6]|blockquote|pre)\b[^>]*>/gi;

const META_CHARSET = /<meta[^>]+charset\s*=\s*["']?\s*([\w:.-]+)/i;

export const TRUNCATION_MARKER = "\n\n[Content truncated...]";

/**
 * Decode every HTML5 named and numeric character reference.
 */
export function decodeEntities(text: string): string {
  return decodeHTML(text);
}

/**
 * Charset of a page: the `Content-Type` header wins, then a `<meta>`
 * declaration near the top of the document, then utf-8.
 */
export function detectCharset(contentType: string | null, bytes: Uint8Array): string {
  const fromHeader = contentType?.match(/charset\s*=\s*["']?([\w:.-]+)/i);
  if (fromHeader) return fromHeader[1].toLowerCase();

  // Declarations are ASCII, so any single-byte decoding of the head finds them
  const head = new TextDecoder("latin1").decode(bytes.subarray(0, 1024));
  const fromMeta = head.match(META_CHARSET);
  return fromMeta ? fromMeta[1].toLowerCase() : "utf-8";
}

/**
 * Decode a response body in its declared charset. Labels the runtime does
 * not know are read as utf-8.
 */
export function decodeBody(bytes: Uint8Array, contentType: string | null): string {
  const charset = detectCharset(contentType, bytes);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(bytes);
}

/**
 * Reduce an HTML page to its readable text: page chrome (navigation,
 * headers, footers, sidebars, scripts, styles, iframes) is dropped, block
 * elements become line breaks and blank lines are removed.
 */
export function htmlToText(html: string): string {
  let text = html.replace(/<!--[\s\S]*?-->/g, "");
  for (const tag of REMOVED_ELEMENTS) {
    text = text.replace(
      new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}\\s*>`, "gi"),
      "\n"
    );
  }
  text = text.replace(BLOCK_TAG, "\n").replace(/<[^>]+>/g, "");
  return decodeEntities(text)
    .split("\n")
    .map((line) => line.replace(/[ \t\r\f\v\u00a0]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

/**
 * Cap text at `maxLength` characters, marking the cut.
 */
export function truncateContent(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength) + TRUNCATION_MARKER;
}
