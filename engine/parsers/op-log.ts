// engine/parsers/op-log.ts — Operation log text -> OpLogEntry records

import type { OpLogEntry, OpLogItem, OpLogRecord } from '../types.js';
import { splitGraph, isDate } from './tokens.js';

const RELATIVE_TIME_RE = /(\d+) (second|minute|hour|day|week|month|year)s? ago/;

const UNIT_SUFFIX: Record<string, string> = {
  second: 's',
  minute: 'm',
  hour: 'h',
  day: 'd',
  week: 'w',
  month: 'mo',
  year: 'y',
};

/**
 * Shorten "3 minutes ago, lasted 3 milliseconds" to "3m ago". Falls back
 * to the first date on absolute-timestamp headers, then to "".
 */
export function shortenRelativeTime(text: string): string {
  const match = RELATIVE_TIME_RE.exec(text);
  if (match) return `${match[1]}${UNIT_SUFFIX[match[2]]} ago`;
  if (/\b(just now|now)\b/.test(text)) return 'now';
  const date = text.split(/\s+/).find(isDate);
  return date ?? '';
}

/**
 * Parse `jj op log`. Each operation is a header line
 * (`@  d3b77addea49 user@host 3 minutes ago, lasted 3 milliseconds`), a
 * summary line and an optional `args:` line.
 */
export function parseOpLog(output: string, shortOpIdLength: number): OpLogRecord {
  const items: OpLogItem[] = [];
  let current: OpLogEntry | null = null;

  for (const line of output.split('\n')) {
    if (line.trim() === '') continue;

    const split = splitGraph(line, false);

    if (split.glyph !== undefined && split.content !== '') {
      const [opId, user] = split.content.split(/\s+/);
      if (/^[0-9a-z]{3,}$/.test(opId)) {
        current = {
          glyph: split.glyph,
          shortOpId: opId.slice(0, shortOpIdLength),
          fullOpId: opId,
          user: user !== undefined && user.includes('@') ? user : undefined,
          relativeTime: shortenRelativeTime(split.content),
          summary: '',
          raw: line,
        };
        items.push({ kind: 'entry', entry: current });
        continue;
      }
    }

    if (split.content === '' || split.content === '(elided revisions)') continue;

    if (current && split.glyph === undefined && split.prefix !== '') {
      if (split.content.startsWith('args:')) {
        current.args = split.content.slice('args:'.length).trim();
        continue;
      }
      if (current.summary === '') {
        current.summary = split.content;
        continue;
      }
    }

    items.push({ kind: 'unparsed', text: line });
  }

  return { items };
}
