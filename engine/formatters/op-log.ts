// engine/formatters/op-log.ts — OpLogRecord -> one line per operation

import type { FilterContext, OpLogEntry, OpLogRecord, RenderedOutput } from '../types.js';
import { joinParts, moreMarker, truncateAtWord } from './text.js';

/**
 * `<glyph> <short_op_id> <relative_time> <summary>`. Verbose mode keeps the
 * full id and summary and adds the recorded command line.
 */
export function formatOpLogEntry(entry: OpLogEntry, ctx: FilterContext): string[] {
  if (ctx.verbose) {
    const line = joinParts([entry.glyph, entry.fullOpId, entry.relativeTime, entry.summary]);
    return entry.args !== undefined ? [line, `  args: ${entry.args}`] : [line];
  }
  return [
    joinParts([
      entry.glyph,
      entry.shortOpId,
      entry.relativeTime,
      truncateAtWord(entry.summary, ctx.config.truncation.opSummary),
    ]),
  ];
}

export function renderOpLog(record: OpLogRecord, ctx: FilterContext): RenderedOutput {
  const limit = ctx.limit ?? ctx.config.limits.opLog;
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
    out.lines.push(...formatOpLogEntry(item.entry, ctx));
    out.targets.push({ raw: item.entry.raw, kinds: ['operation'] });
    shown++;
  }

  if (omitted > 0) {
    out.lines.push(moreMarker(omitted, omittedUnparsed));
    out.truncated = true;
  }
  if (out.lines.length === 0) out.lines.push('No operations');

  return out;
}
