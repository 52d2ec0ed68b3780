// engine/formatters/status.ts — StatusRecord -> working copy, changes, parents, conflicts

import type { FileChangeOp, FilterContext, LogEntry, RenderedOutput, StatusRecord } from '../types.js';
import { joinParts, moreMarker, shortenId, truncateText } from './text.js';

const OP_LETTER: Record<FileChangeOp, string> = {
  Modified: 'M',
  Added: 'A',
  Deleted: 'D',
  Renamed: 'R',
  Copied: 'C',
  Conflicted: 'U',
};

function formatWorkingCopy(entry: LogEntry, ctx: FilterContext): string {
  const { truncation } = ctx.config;
  return joinParts([
    '@',
    `${shortenId(entry.changeId, truncation.shortId, ctx.verbose)}${entry.changeIdSuffix ?? ''}`,
    entry.commitId !== undefined ? shortenId(entry.commitId, truncation.shortId, ctx.verbose) : undefined,
    ...entry.bookmarks,
    entry.isEmpty ? '(empty)' : undefined,
    entry.isConflicted ? '(conflict)' : undefined,
    truncateText(entry.description, truncation.message),
  ]);
}

/**
 * Parents are named by bookmark when they have one, by commit hash otherwise.
 */
function formatParent(entry: LogEntry, ctx: FilterContext): string {
  const { truncation } = ctx.config;
  const named = entry.bookmarks.length > 0;
  return joinParts([
    '@-',
    `${shortenId(entry.changeId, truncation.shortId, ctx.verbose)}${entry.changeIdSuffix ?? ''}`,
    ...(named ? entry.bookmarks : []),
    !named && entry.commitId !== undefined ? shortenId(entry.commitId, truncation.shortId, ctx.verbose) : undefined,
    entry.isConflicted ? '(conflict)' : undefined,
  ]);
}

export function renderStatus(record: StatusRecord, ctx: FilterContext): RenderedOutput {
  const out: RenderedOutput = {
    lines: [],
    targets: [],
    parsedLines: 0,
    unparsedLines: record.unparsed.length,
    truncated: false,
  };

  if (record.workingCopy) {
    out.lines.push(formatWorkingCopy(record.workingCopy, ctx));
    out.targets.push({ raw: record.workingCopy.raw, kinds: ['change', 'commit'] });
    out.parsedLines++;
  }

  if (record.hasChanges) {
    const limit = ctx.config.limits.statusFiles;
    for (const change of record.fileChanges.slice(0, limit)) {
      out.lines.push(`${OP_LETTER[change.op]} ${change.path}`);
    }
    if (record.fileChanges.length > limit) {
      out.lines.push(moreMarker(record.fileChanges.length - limit));
      out.truncated = true;
    }
  }
  out.parsedLines += record.fileChanges.length;

  for (const parent of record.parents) {
    out.lines.push(formatParent(parent, ctx));
    out.targets.push({
      raw: parent.raw,
      kinds: parent.bookmarks.length > 0 ? ['change'] : ['change', 'commit'],
    });
    out.parsedLines++;
  }

  if (record.conflicts.length > 0) {
    const n = record.conflicts.length;
    out.lines.push(`Conflicts: ${n} file${n === 1 ? '' : 's'}`);
    for (const conflict of record.conflicts) {
      out.lines.push(`${conflict.path} (${conflict.sideCount}-sided)`);
    }
    out.parsedLines += n;
  }

  out.lines.push(...record.unparsed.map(u => u.text));
  if (out.lines.length === 0) out.lines.push('Clean working copy');

  return out;
}
