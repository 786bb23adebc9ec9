/**
 * HTML to plain text conversion for posting descriptions
 *
 * List items become "• " bullet lines and block elements become line
 * breaks, so the requirements extractor can work line by line on text that
 * started life as HTML. Entities are decoded by cheerio.
 */

import { load } from "cheerio";

const BLOCK_ELEMENTS =
  "p, div, section, article, header, footer, h1, h2, h3, h4, h5, h6, ul, ol, table, tr, blockquote, pre, dl, dt, dd";

const HTML_TAG_PATTERN = /<\/?[a-z][a-z0-9-]*(?:\s[^<>]*)?\/?>/i;

const BARE_BULLET = "•";

/**
 * Cheap check for markup (a tag-looking token)
 */
export function looksLikeHtml(text: string): boolean {
  return HTML_TAG_PATTERN.test(text);
}

/**
 * Decode entities once. Some boards ship HTML escaped as text
 * ("&lt;p&gt;...") which must be decoded before it can be parsed.
 */
export function decodeHtmlEntities(text: string): string {
  return load(text).root().text();
}

/**
 * Collapse whitespace inside lines and drop empty lines. A line holding
 * only a bullet is merged into the next line.
 */
export function normalizeLines(text: string): string {
  const lines: string[] = [];
  let pendingBullet = false;

  for (const raw of text.replace(/\r\n?/g, "\n").split("\n")) {
    const line = raw.replace(/\s+/g, " ").trim();
    if (!line) {
      continue;
    }
    if (line === BARE_BULLET) {
      pendingBullet = true;
      continue;
    }
    lines.push(pendingBullet ? `${BARE_BULLET} ${line}` : line);
    pendingBullet = false;
  }

  return lines.join("\n");
}

/**
 * Convert an HTML fragment to normalized text
 *
 * @example
 * htmlToText("<h3>Requirements</h3><ul><li>Python</li><li>SQL &amp; Git</li></ul>")
 * // "Requirements\n• Python\n• SQL & Git"
 */
export function htmlToText(html: string): string {
  const $ = load(html);

  $("script, style, noscript").remove();
  $("br").replaceWith("\n");
  $("li").each((_, el) => {
    $(el).prepend(`\n${BARE_BULLET} `).append("\n");
  });
  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).prepend("\n").append("\n");
  });

  return normalizeLines($.root().text());
}

/**
 * Normalize a description that may be HTML, escaped HTML or plain text
 */
export function descriptionToText(description: string): string {
  const unescaped = /&lt;\/?[a-z]/i.test(description)
    ? decodeHtmlEntities(description)
    : description;

  return looksLikeHtml(unescaped)
    ? htmlToText(unescaped)
    : normalizeLines(unescaped);
}
