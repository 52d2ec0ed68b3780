// engine/formatters/diff.ts — DiffRecord / ShowRecord -> stat summary + capped hunks

import type {
  DiffFile,
  DiffRecord,
  FilterContext,
  RenderedOutput,
  ShowHeader,
  ShowRecord,
} from '../types.js';
import { ELLIPSIS, joinParts, shortenId, truncateText } from './text.js';

function fileLabel(file: DiffFile): string {
  switch (file.change) {
    case 'added':
      return `${file.path} (new)`;
    case 'deleted':
      return `${file.path} (deleted)`;
    case 'renamed':
    case 'copied':
      return file.oldPath !== undefined ? `${file.oldPath} → ${file.path}` : file.path;
    default:
      return file.path;
  }
}

export function formatStatLine(file: DiffFile): string {
  if (file.binary) return `${fileLabel(file)} | binary`;
  return `${fileLabel(file)} | +${file.stat.added} -${file.stat.removed}`;
}

function hunkHeader(header: string): string {
  const match = /^(@@ [^@]* @@)/.exec(header);
  return match ? match[1] : header;
}

function changedLines(lines: string[]): string[] {
  return lines.filter(l => l.startsWith('+') || l.startsWith('-'));
}

/**
 * Render the file list, then the changed lines of each hunk.
 *
 * Only `+`/`-` lines are shown. Each hunk is capped at `diff.hunkLines`
 * and the whole output at `diff.totalLines`; both cuts leave a marker with
 * the omitted line count.
 */
export function renderDiff(record: DiffRecord, ctx: FilterContext): RenderedOutput {
  const { hunkLines, totalLines } = ctx.config.diff;
  const out: RenderedOutput = {
    lines: record.unparsed.map(u => u.text),
    targets: [],
    parsedLines: 0,
    unparsedLines: record.unparsed.length,
    truncated: false,
  };

  if (record.files.length === 0) {
    if (out.lines.length === 0) out.lines.push('No changes');
    return out;
  }

  for (const file of record.files) {
    out.lines.push(formatStatLine(file));
    out.parsedLines += 1 + file.hunks.reduce((n, h) => n + 1 + h.lines.length, 0);
  }

  if (record.files.length > 1) {
    const added = record.files.reduce((n, f) => n + f.stat.added, 0);
    const removed = record.files.reduce((n, f) => n + f.stat.removed, 0);
    out.lines.push(`${record.files.length} files changed, +${added} -${removed}`);
  }

  let budget = totalLines;
  let omittedTotal = 0;

  for (const file of record.files) {
    const hunks = file.hunks.map(h => ({ header: hunkHeader(h.header), lines: changedLines(h.lines) }));
    if (file.binary || hunks.every(h => h.lines.length === 0)) continue;

    if (budget <= 0) {
      omittedTotal += hunks.reduce((n, h) => n + h.lines.length, 0);
      continue;
    }

    out.lines.push('', file.path);
    for (const hunk of hunks) {
      if (budget <= 0) {
        omittedTotal += hunk.lines.length;
        continue;
      }
      out.lines.push(hunk.header);

      const take = Math.min(hunk.lines.length, hunkLines, budget);
      out.lines.push(...hunk.lines.slice(0, take));
      budget -= take;

      const rest = hunk.lines.length - take;
      if (rest > 0 && take === hunkLines) {
        out.lines.push(`${ELLIPSIS} ${rest} more lines`);
        out.truncated = true;
      } else if (rest > 0) {
        omittedTotal += rest;
      }
    }
  }

  if (omittedTotal > 0) {
    out.lines.push(`${ELLIPSIS} ${omittedTotal} more lines not shown (limit ${totalLines})`);
    out.truncated = true;
  }

  return out;
}

function formatShowHeader(header: ShowHeader, ctx: FilterContext): string {
  const { truncation } = ctx.config;
  return joinParts([
    header.changeId !== undefined ? shortenId(header.changeId, truncation.shortId, ctx.verbose) : undefined,
    header.commitId !== undefined ? shortenId(header.commitId, truncation.shortId, ctx.verbose) : undefined,
    ...header.bookmarks,
    ctx.verbose && header.author !== undefined ? `(${header.author})` : undefined,
    header.isEmpty ? '(empty)' : undefined,
    truncateText(header.description, truncation.message),
  ]);
}

/**
 * One summary line for the commit, then the diff rendering.
 */
export function renderShow(record: ShowRecord, ctx: FilterContext): RenderedOutput {
  const diff = renderDiff(record.diff, ctx);
  if (!record.header) return diff;

  const headerLine = formatShowHeader(record.header, ctx);
  const lines = record.diff.files.length === 0
    ? [headerLine, ...diff.lines.filter(l => l !== 'No changes')]
    : [headerLine, ...diff.lines];

  return {
    ...diff,
    lines,
    targets: [{ raw: record.header.raw, kinds: ['change', 'commit'] }, ...diff.targets],
    parsedLines: diff.parsedLines + 1,
  };
}
