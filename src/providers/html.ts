/**
 * Minimal HTML text extraction for scraped quote pages.
 */

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&nbsp;': ' ',
  '&quot;': '"',
  '&#39;': "'",
  '&#x27;': "'",
  '&lt;': '<',
  '&gt;': '>',
};

export function decodeHtml(text: string): string {
  return text
    .replace(/&(?:amp|nbsp|quot|lt|gt|#39|#x27);/g, (entity) => ENTITIES[entity] ?? entity)
    .trim();
}

export function stripTags(html: string): string {
  return decodeHtml(html.replace(/<[^>]+>/g, ' ')).replace(/\s+/g, ' ').trim();
}

/** All table rows of the page as arrays of cell texts. */
export function extractTableRows(html: string): string[][] {
  return Array.from(html.matchAll(/<tr[^>]*>([\s\S]*?)<\/tr>/gi))
    .map((row) =>
      Array.from(row[1].matchAll(/<t[dh][^>]*>([\s\S]*?)<\/t[dh]>/gi)).map((cell) =>
        stripTags(cell[1])
      )
    )
    .filter((cells) => cells.length >= 2);
}

export function extractFirst(html: string, pattern: RegExp): string | null {
  const match = html.match(pattern);
  const captured = match?.[1];
  return captured === undefined ? null : stripTags(captured) || null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pages embed their data as JSON inside script tags, often as a JSON string
 * within JSON. Quotes are unescaped once so both forms match the same way.
 */
function embeddedText(html: string): string {
  return html.replace(/\\"/g, '"');
}

/** First string value of `"key":"..."` in the page's embedded JSON. */
export function extractEmbeddedString(html: string, key: string): string | null {
  const pattern = new RegExp(`"${escapeRegExp(key)}":"((?:[^"\\\\]|\\\\.)*)"`);
  const captured = embeddedText(html).match(pattern)?.[1];
  if (captured === undefined) return null;

  let value: string = captured;
  try {
    const decoded: unknown = JSON.parse(`"${captured}"`);
    if (typeof decoded === 'string') value = decoded;
  } catch {
    value = captured.replace(/\\(.)/g, '$1');
  }
  return decodeHtml(value) || null;
}

/** First numeric value of `"key":1.5` or `"key":{"raw":1.5,...}` in the page's embedded JSON. */
export function extractEmbeddedNumber(html: string, key: string): number | null {
  const pattern = new RegExp(`"${escapeRegExp(key)}":(?:\\{"raw":)?(-?\\d+(?:\\.\\d+)?(?:[eE][-+]?\\d+)?)`);
  const captured = embeddedText(html).match(pattern)?.[1];
  if (captured === undefined) return null;
  const parsed = Number(captured);
  return Number.isFinite(parsed) ? parsed : null;
}
