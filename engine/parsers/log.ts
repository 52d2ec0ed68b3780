// engine/parsers/log.ts — Graph log text -> ordered LogEntry records

import type { LogEntry, LogItem, LogRecord } from '../types.js';
import {
  splitGraph,
  isAsciiGlyph,
  isEmail,
  isTimestampPart,
  looksLikeHash,
  looksLikeChangeId,
  looksLikeShortId,
  parseDescription,
  splitChangeIdSuffix,
} from './tokens.js';

// Header words that flag state rather than name a bookmark
const STATE_WORDS = new Set(['conflict', 'divergent', 'hidden', 'immutable']);
const SKIPPED_WORDS = new Set(['git_head()', 'git_head']);
const RELATIVE_TIME_RE = /\b\d+ (?:second|minute|hour|day|week|month|year)s? ago\b/;

/**
 * Parse the text after the node glyph on a log header line, e.g.
 * `mpqrykyp user@example.com 2023-02-12 15:00:22 main aef4df99`.
 *
 * Returns null when the line has no id-like leading token.
 */
export function parseLogHeader(content: string, glyph: string, raw: string): LogEntry | null {
  const timestamp: string[] = [];
  const relative = RELATIVE_TIME_RE.exec(content);
  if (relative) timestamp.push(relative[0]);

  const cleaned = content
    .replace(RELATIVE_TIME_RE, '')
    .replace(/\(no email set\)/g, '')
    .trim();
  const tokens = cleaned.split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return null;

  const { id: changeId, divergent, suffix } = splitChangeIdSuffix(tokens[0]);
  if (!looksLikeShortId(changeId)) return null;

  const entry: LogEntry = {
    glyph,
    changeId,
    changeIdSuffix: suffix,
    bookmarks: [],
    description: '',
    isEmpty: false,
    isConflicted: false,
    isDivergent: divergent,
    raw,
  };

  const rest = tokens.slice(1);

  // The commit hash is the last hash-like token: bookmarks sit before it
  // in current releases and after it in older ones.
  let hashIndex = -1;
  for (let i = rest.length - 1; i >= 0; i--) {
    if (looksLikeHash(rest[i])) {
      hashIndex = i;
      break;
    }
  }

  for (const [i, token] of rest.entries()) {
    if (i === hashIndex) {
      entry.commitId = token;
    } else if ((i === 0 && token.includes('@')) || isEmail(token)) {
      // Author comes first; "main@origin" later on is a remote bookmark
      entry.author = entry.author ?? token.replace(/^<|>$/g, '');
    } else if (isTimestampPart(token)) {
      timestamp.push(token);
    } else if (STATE_WORDS.has(token)) {
      if (token === 'conflict') entry.isConflicted = true;
      if (token === 'divergent') entry.isDivergent = true;
    } else if (SKIPPED_WORDS.has(token) || token.startsWith('(')) {
      continue;
    } else {
      entry.bookmarks.push(token);
    }
  }

  if (timestamp.length > 0) entry.timestamp = timestamp.join(' ');
  return entry;
}

/**
 * Parse graph log output into entries in upstream order.
 *
 * A header line carries a node glyph followed by an id; the first
 * lane-prefixed line after it is the description. Pure lane drawing and
 * elision markers are structure and produce nothing. Anything else is
 * kept as an unparsed line so the formatter can echo it.
 */
export function parseLog(output: string): LogRecord {
  const items: LogItem[] = [];
  let current: LogEntry | null = null;
  let described = false;

  for (const line of output.split('\n')) {
    if (line.trim() === '') continue;

    let split = splitGraph(line);
    let entry: LogEntry | null = null;

    if (split.glyph !== undefined && split.content !== '') {
      entry = parseLogHeader(split.content, split.glyph, line);
      if (entry && isAsciiGlyph(split.glyph) && entry.commitId === undefined && !looksLikeChangeId(entry.changeId)) {
        entry = null;
      }
      if (!entry && isAsciiGlyph(split.glyph)) {
        // "x marks the spot" is a description, not an ASCII node
        split = splitGraph(line, false);
      }
    }

    if (entry) {
      items.push({ kind: 'entry', entry });
      current = entry;
      described = false;
      continue;
    }

    if (split.content === '' || split.content === '(elided revisions)') continue;

    if (current && !described && split.glyph === undefined && split.prefix !== '') {
      const parts = parseDescription(split.content);
      current.description = parts.description;
      current.isEmpty = current.isEmpty || parts.isEmpty;
      current.isConflicted = current.isConflicted || parts.isConflicted;
      current.isDivergent = current.isDivergent || parts.isDivergent;
      described = true;
      continue;
    }

    items.push({ kind: 'unparsed', text: line });
  }

  return { items };
}
