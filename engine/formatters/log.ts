// engine/formatters/log.ts — LogRecord -> one compact line per entry

import type { FilterContext, LogEntry, LogRecord, RenderedOutput } from '../types.js';
import { joinParts, moreMarker, shortenId, truncateText } from './text.js';

/**
 * `<glyph> <change_id> <commit_hash> [bookmarks] [flags] [description]`.
 * Author and timestamp are dropped; verbose keeps the timestamp and full ids.
 */
export function formatLogEntry(entry: LogEntry, ctx: FilterContext): string {
  const { truncation } = ctx.config;
  return joinParts([
    entry.glyph,
    `${shortenId(entry.changeId, truncation.shortId, ctx.verbose)}${entry.changeIdSuffix ?? ''}`,
    entry.commitId !== undefined ? shortenId(entry.commitId, truncation.shortId, ctx.verbose) : undefined,
    ctx.verbose ? entry.timestamp : undefined,
    ...entry.bookmarks,
    entry.isEmpty ? '(empty)' : undefined,
    entry.isConflicted ? '(conflict)' : undefined,
    entry.isDivergent ? '(divergent)' : undefined,
    truncateText(entry.description, truncation.message),
  ]);
}

export function renderLog(record: LogRecord, ctx: FilterContext): RenderedOutput {
  const limit = ctx.limit ?? ctx.config.limits.log;
  const out: RenderedOutput = {
    lines: [],
    targets: [],
    parsedLines: 0,
    unparsedLines: 0,
    truncated: false,
  };

  let shown = 0;
  let omitted = 0;
  let omittedUnparsed = 0;

  for (const item of record.items) {
    if (item.kind === 'unparsed') {
      out.unparsedLines++;
      if (omitted > 0) omittedUnparsed++;
      else out.lines.push(item.text);
      continue;
    }

    out.parsedLines++;
    if (shown >= limit) {
      omitted++;
      continue;
    }
    out.lines.push(formatLogEntry(item.entry, ctx));
    out.targets.push({ raw: item.entry.raw, kinds: ['change', 'commit'] });
    shown++;
  }

  if (omitted > 0) {
    out.lines.push(moreMarker(omitted, omittedUnparsed));
    out.truncated = true;
  }
  if (out.lines.length === 0) out.lines.push('No commits');

  return out;
}
