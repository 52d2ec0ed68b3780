// engine/formatters/text.ts — Truncation and marker helpers shared by formatters

export const ELLIPSIS = '…';

/**
 * Cap `text` at `max` characters, replacing the tail with an ellipsis.
 * Counts code points so multi-byte characters are never split.
 */
export function truncateText(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return chars.slice(0, Math.max(0, max - 1)).join('').trimEnd() + ELLIPSIS;
}

/**
 * Keep whole words up to `max` characters and mark the cut with " …".
 * The first word is always kept, however long.
 */
export function truncateAtWord(text: string, max: number): string {
  const words = text.trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) return '';
  if (text.trim().length <= max) return words.join(' ');

  let kept = words[0];
  for (const word of words.slice(1)) {
    if (kept.length + 1 + word.length > max) break;
    kept = `${kept} ${word}`;
  }
  return kept === words.join(' ') ? kept : `${kept} ${ELLIPSIS}`;
}

export function shortenId(id: string, length: number, verbose: boolean): string {
  return verbose ? id : id.slice(0, length);
}

/**
 * Explicit truncation marker: "… 2 more", "… 2 more (+1 unparsed lines)".
 */
export function moreMarker(count: number, unparsed = 0): string {
  const suffix = unparsed > 0 ? ` (+${unparsed} unparsed line${unparsed === 1 ? '' : 's'})` : '';
  return `${ELLIPSIS} ${count} more${suffix}`;
}

export function joinParts(parts: Array<string | undefined>): string {
  return parts.filter((p): p is string => p !== undefined && p !== '').join(' ');
}
