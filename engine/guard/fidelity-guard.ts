// engine/guard/fidelity-guard.ts — Identifier-preservation and parse-coverage checks

import type { CompactConfig, FidelityVerdict, GuardTarget, IdentifierKind, RenderedOutput } from '../types.js';
import { looksLikeChangeId, looksLikeHash } from '../parsers/tokens.js';

const BOOKMARK_LINE_RE = /^\s*([^\s:()]+)(?:\s+\((?:deleted|conflicted)\))?:/;
const DELETED_LINE_RE = /^\s*(\S+)\s+\(deleted\)/;

/** Strip the punctuation that wraps tokens: "(empty)", "main:", "ago,", "+kntqzsqt". */
function cleanToken(token: string): string {
  return token.replace(/^[(<"'`[+-]+/, '').replace(/[)>\]"'`,:;.?!]+$/, '');
}

/**
 * Lexically re-scan raw entry text for identifiers of the given kinds.
 * Independent of the parsers, so an id a parser failed to pick up is
 * still found here.
 */
export function extractIdentifiers(raw: string, kinds: IdentifierKind[]): string[] {
  const found: string[] = [];

  if (kinds.includes('bookmark')) {
    const firstLine = raw.split('\n')[0] ?? '';
    const match = BOOKMARK_LINE_RE.exec(firstLine) ?? DELETED_LINE_RE.exec(firstLine);
    if (match) found.push(match[1]);
  }

  for (const token of raw.split(/\s+/)) {
    // Emails and user@host never identify a revision
    if (token.includes('@')) continue;
    const cleaned = cleanToken(token);
    if (cleaned === '') continue;

    if (kinds.includes('change') && looksLikeChangeId(cleaned)) found.push(cleaned);
    else if ((kinds.includes('commit') || kinds.includes('operation')) && looksLikeHash(cleaned)) found.push(cleaned);
  }

  return [...new Set(found)];
}

function isPreserved(
  id: string,
  words: Set<string>,
  allIds: string[],
  minPrefix: number,
): boolean {
  if (words.has(id)) return true;
  const needed = Math.min(minPrefix, id.length);
  for (const word of words) {
    if (word.length < needed || !id.startsWith(word)) continue;
    const ambiguous = allIds.some(other => other !== id && other.startsWith(word));
    if (!ambiguous) return true;
  }
  return false;
}

/**
 * Verify a rendering before it is emitted.
 *
 * Fails when the unparsed share of candidate lines exceeds
 * `fidelity.maxUnparsedRatio`, or when an identifier present in the raw
 * text of a rendered entry is absent from the compact text (in full or as
 * an unambiguous prefix of at least `fidelity.minIdPrefix` characters).
 */
export function checkFidelity(
  rendered: RenderedOutput,
  compactText: string,
  config: Pick<CompactConfig, 'fidelity'>,
): FidelityVerdict {
  const { maxUnparsedRatio, minIdPrefix } = config.fidelity;

  const total = rendered.parsedLines + rendered.unparsedLines;
  if (total > 0 && rendered.unparsedLines / total > maxUnparsedRatio) {
    return { ok: false, reason: 'unparsed-ratio', missing: [] };
  }

  const expected = rendered.targets.flatMap((t: GuardTarget) => extractIdentifiers(t.raw, t.kinds));
  const allIds = [...new Set(expected)];
  const words = new Set(compactText.split(/\s+/).map(cleanToken).filter(Boolean));

  const missing = allIds.filter(id => !isPreserved(id, words, allIds, minIdPrefix));
  if (missing.length > 0) {
    return { ok: false, reason: 'missing-identifiers', missing };
  }

  return { ok: true };
}
