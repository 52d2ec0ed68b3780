// engine/parsers/tokens.ts — Lexical helpers shared by the per-command parsers

// Node glyphs drawn by the graph renderer. ASCII styles reuse letters, so
// those only count as glyphs when followed by whitespace.
const UNICODE_GLYPHS = new Set(['@', '○', '◆', '●', '×', '◉', '◌', '◇', '◎', '⊙']);
const ASCII_GLYPHS = new Set(['o', '*', 'x']);

// Edge and lane drawing characters, including the elision marker.
const LANE_CHARS = new Set([
  '│', '├', '┤', '┬', '┴', '┼', '─', '╮', '╯', '╭', '╰', '╷', '╵', '┆', '┊',
  '|', '/', '\\', '~',
]);

export interface GraphSplit {
  /** Lane drawing before (and after) the node glyph, untrimmed */
  prefix: string;
  glyph?: string;
  content: string;
}

function isLaneOrSpace(ch: string): boolean {
  return LANE_CHARS.has(ch) || ch === ' ' || ch === '\t';
}

/**
 * Split a graph-prefixed line into its lane drawing, node glyph and text.
 *
 * @param asciiGlyphs  also accept `o`, `*` and `x` as node glyphs
 */
export function splitGraph(line: string, asciiGlyphs = true): GraphSplit {
  const chars = Array.from(line);
  let i = 0;
  let glyph: string | undefined;

  const consumeLanes = (): void => {
    while (i < chars.length && isLaneOrSpace(chars[i])) i++;
  };

  consumeLanes();
  if (i < chars.length) {
    const ch = chars[i];
    const next = chars[i + 1];
    const followedBySpace = next === undefined || next === ' ' || next === '\t';
    if (UNICODE_GLYPHS.has(ch) && followedBySpace) {
      glyph = ch;
      i++;
      consumeLanes();
    } else if (asciiGlyphs && ASCII_GLYPHS.has(ch) && followedBySpace) {
      glyph = ch;
      i++;
      consumeLanes();
    }
  }

  return {
    prefix: chars.slice(0, i).join(''),
    glyph,
    content: chars.slice(i).join('').trim(),
  };
}

export function isAsciiGlyph(glyph: string | undefined): boolean {
  return glyph !== undefined && ASCII_GLYPHS.has(glyph);
}

// ─── Token Classes ───────────────────────────────────────────────────────────

const EMAIL_RE = /^<?[^@\s<>]+@[^@\s<>]+\.[^@\s<>]+>?$/;
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const TIME_RE = /^\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const TZ_RE = /^[+-]\d{2}:?\d{2}$/;
const HEX_RE = /^[0-9a-f]{7,64}$/;
const CHANGE_ID_RE = /^[k-z]{8,32}$/;
const SHORT_ID_RE = /^[0-9a-z]{4,64}$/;

export function isEmail(token: string): boolean {
  return EMAIL_RE.test(token);
}

export function isTimestampPart(token: string): boolean {
  return DATE_RE.test(token) || TIME_RE.test(token) || TZ_RE.test(token);
}

export function isDate(token: string): boolean {
  return DATE_RE.test(token);
}

/**
 * A content hash as printed by git or jj: at least 7 hex digits. Short
 * all-letter runs such as "defaced" are words, not hashes.
 */
export function looksLikeHash(token: string): boolean {
  return HEX_RE.test(token) && (/\d/.test(token) || token.length >= 12);
}

/** jj change ids use the reversed-hex alphabet k..z. */
export function looksLikeChangeId(token: string): boolean {
  return CHANGE_ID_RE.test(token);
}

/** Any lowercase alphanumeric token that could be a (short) id. */
export function looksLikeShortId(token: string): boolean {
  return SHORT_ID_RE.test(token);
}

// ─── Descriptions ────────────────────────────────────────────────────────────

const MARKER_RE = /^\((empty|no description set|conflict|divergent|hidden)\)\s*/;

export interface DescriptionParts {
  description: string;
  isEmpty: boolean;
  isConflicted: boolean;
  isDivergent: boolean;
}

/**
 * Peel the leading parenthetical markers jj puts before a description.
 */
export function parseDescription(text: string): DescriptionParts {
  const parts: DescriptionParts = {
    description: '',
    isEmpty: false,
    isConflicted: false,
    isDivergent: false,
  };

  let rest = text.trim();
  let match = MARKER_RE.exec(rest);
  while (match) {
    if (match[1] === 'empty') parts.isEmpty = true;
    else if (match[1] === 'conflict') parts.isConflicted = true;
    else if (match[1] === 'divergent') parts.isDivergent = true;
    rest = rest.slice(match[0].length);
    match = MARKER_RE.exec(rest);
  }

  parts.description = rest.trim();
  return parts;
}

/**
 * Split "kntqzsqt??" or "kntqzsqt/1" into the id and its divergence suffix.
 * The `/N` offset is what tells two divergent commits of one change apart.
 */
export function splitChangeIdSuffix(token: string): { id: string; divergent: boolean; suffix?: string } {
  const match = /^([0-9a-z]+)(\?\?|\/\d+)$/.exec(token);
  if (match) return { id: match[1], divergent: true, suffix: match[2] };
  return { id: token, divergent: false };
}
