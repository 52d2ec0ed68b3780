// engine/formatters/bookmark.ts — BookmarkRecord -> `<name>: <change_id> <hash>` lines

import type { BookmarkEntry, BookmarkRecord, FilterContext, RemoteTracking, RenderedOutput } from '../types.js';
import { joinParts, moreMarker, shortenId } from './text.js';

// The colocated git remote mirrors every local bookmark; listing it adds nothing
const HIDDEN_REMOTES = new Set(['git']);

function shortIds(ids: { changeId?: string; commitId?: string }, ctx: FilterContext): string {
  const { shortId } = ctx.config.truncation;
  return joinParts([
    ids.changeId !== undefined ? shortenId(ids.changeId, shortId, ctx.verbose) : undefined,
    ids.commitId !== undefined ? shortenId(ids.commitId, shortId, ctx.verbose) : undefined,
  ]);
}

function visibleRemotes(entry: BookmarkEntry): RemoteTracking[] {
  return entry.remotes.filter(r => !HIDDEN_REMOTES.has(r.remote));
}

/** A deleted bookmark survives only on its remotes, so their targets are shown. */
function trackingNote(entry: BookmarkEntry, ctx: FilterContext): string | undefined {
  const remotes = visibleRemotes(entry).map(r =>
    joinParts([`@${r.remote}`, r.status, entry.deleted ? shortIds(r, ctx) : undefined]),
  );
  return remotes.length > 0 ? `(tracked ${remotes.join(', ')})` : undefined;
}

export function formatBookmark(entry: BookmarkEntry, ctx: FilterContext): string {
  if (entry.sides.length > 0) {
    const sides = entry.sides.map(s => `${s.added ? '+' : '-'}${shortIds(s, ctx)}`);
    return joinParts([`${entry.name} (conflicted):`, ...sides, trackingNote(entry, ctx)]);
  }

  const flag = entry.deleted ? '(deleted)' : entry.conflicted ? '(conflicted)' : undefined;
  const ids = shortIds(entry, ctx);
  const name = ids !== '' ? `${entry.name}:` : entry.name;
  return joinParts([name, ids, flag, trackingNote(entry, ctx)]);
}

/** Raw text whose ids the compact line must keep. */
function guardText(entry: BookmarkEntry): string {
  if (!entry.deleted) return entry.raw;
  return [entry.raw, ...visibleRemotes(entry).map(r => r.head)].join('\n');
}

export function renderBookmarks(record: BookmarkRecord, ctx: FilterContext): RenderedOutput {
  const limit = ctx.limit ?? ctx.config.limits.bookmarks;
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
    out.lines.push(formatBookmark(item.entry, ctx));
    out.targets.push({ raw: guardText(item.entry), kinds: ['bookmark', 'change', 'commit'] });
    shown++;
  }

  if (omitted > 0) {
    out.lines.push(moreMarker(omitted, omittedUnparsed));
    out.truncated = true;
  }
  if (out.lines.length === 0) out.lines.push('No bookmarks');

  return out;
}
