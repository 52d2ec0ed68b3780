// engine/parsers/bookmark.ts — Bookmark list text -> BookmarkEntry records

import type { BookmarkEntry, BookmarkItem, BookmarkRecord } from '../types.js';
import { looksLikeShortId } from './tokens.js';

const LOCAL_RE = /^(\S+?)(?:\s+\((deleted|conflicted)\))?:\s*(.*)$/;
const DELETED_RE = /^(\S+)\s+\(deleted\)$/;
const REMOTE_RE = /^\s+@(\S+?)(?:\s+\(([^)]*)\))?:\s*(.*)$/;
const CONFLICT_SIDE_RE = /^\s+([+-])\s+(.*)$/;

/** The line up to and including its last id token; descriptions follow. */
function headOf(line: string, ids: { changeId?: string; commitId?: string }): string {
  const last = ids.commitId ?? ids.changeId;
  if (last === undefined) return line;
  const colon = line.indexOf(':');
  const at = line.indexOf(last, colon);
  return at === -1 ? line : line.slice(0, at + last.length);
}

function targetIds(text: string): { changeId?: string; commitId?: string } {
  const [changeId, commitId] = text.trim().split(/\s+/);
  if (!changeId || !looksLikeShortId(changeId)) return {};
  return {
    changeId,
    commitId: commitId !== undefined && looksLikeShortId(commitId) ? commitId : undefined,
  };
}

/**
 * Parse `jj bookmark list`. Local bookmarks start at column 0; indented
 * `@remote:` lines record tracking for the bookmark above them, and
 * indented `+`/`-` lines list the sides of a conflicted bookmark. Side
 * lines are folded into the entry's raw text so their ids are guarded.
 */
export function parseBookmarks(output: string): BookmarkRecord {
  const items: BookmarkItem[] = [];
  let current: BookmarkEntry | null = null;

  for (const line of output.split('\n')) {
    if (line.trim() === '' || line.startsWith('Hint:')) continue;

    const remote = REMOTE_RE.exec(line);
    if (remote && current) {
      const ids = targetIds(remote[3]);
      current.remotes.push({ remote: remote[1], status: remote[2], ...ids, head: headOf(line, ids) });
      continue;
    }

    const side = current?.conflicted ? CONFLICT_SIDE_RE.exec(line) : null;
    if (side && current) {
      const ids = targetIds(side[2]);
      if (ids.changeId !== undefined) {
        current.sides.push({ added: side[1] === '+', changeId: ids.changeId, commitId: ids.commitId });
        current.raw = `${current.raw}\n${headOf(line, ids)}`;
        continue;
      }
    }

    const deleted = DELETED_RE.exec(line);
    if (deleted) {
      current = { name: deleted[1], remotes: [], sides: [], deleted: true, conflicted: false, raw: line };
      items.push({ kind: 'entry', entry: current });
      continue;
    }

    const local = /^\S/.test(line) ? LOCAL_RE.exec(line) : null;
    const ids: { changeId?: string; commitId?: string } = local ? targetIds(local[3]) : {};
    if (local && (ids.changeId !== undefined || local[2] !== undefined)) {
      current = {
        name: local[1],
        ...ids,
        remotes: [],
        sides: [],
        deleted: local[2] === 'deleted',
        conflicted: local[2] === 'conflicted',
        raw: headOf(line, ids),
      };
      items.push({ kind: 'entry', entry: current });
      continue;
    }

    items.push({ kind: 'unparsed', text: line });
  }

  return { items };
}
