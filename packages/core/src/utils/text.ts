/**
 * Text helpers for scraped markup
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '-',
  mdash: '-',
};

const MAX_CODE_POINT = 0x10ffff;

/** Out-of-range references are left as written */
function fromCodePoint(match: string, value: number): string {
  return Number.isInteger(value) && value <= MAX_CODE_POINT ? String.fromCodePoint(value) : match;
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, code: string) => {
    if (code.startsWith('#x') || code.startsWith('#X')) {
      return fromCodePoint(match, parseInt(code.slice(2), 16));
    }
    if (code.startsWith('#')) {
      return fromCodePoint(match, parseInt(code.slice(1), 10));
    }
    return NAMED_ENTITIES[code.toLowerCase()] ?? match;
  });
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Drop script, style and noscript blocks, then every remaining tag
 */
export function stripTags(html: string): string {
  return html
    .replace(/<(script|style|noscript|template)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<[^>]+>/g, ' ');
}

/**
 * Tag-free, entity-decoded, single-spaced value
 */
export function cleanValue(text: string): string {
  return collapseWhitespace(decodeEntities(stripTags(text)));
}

/**
 * Visible text of a page with one line per block element
 */
export function htmlToText(html: string): string {
  const withBreaks = html
    .replace(/<(script|style|noscript|template)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|tr|li|h[1-6]|table|section|article|dd|dt|ul|ol)\s*>/gi, '\n');

  return decodeEntities(stripTags(withBreaks))
    .split('\n')
    .map(collapseWhitespace)
    .filter((line) => line.length > 0)
    .join('\n');
}
