// engine/parsers/diff.ts — Unified (git-format) diff and show text -> DiffRecord / ShowRecord

import type { DiffFile, DiffRecord, ShowHeader, ShowRecord, UnparsedLine } from '../types.js';
import { parseDescription } from './tokens.js';

const DIFF_HEADER_RE = /^diff --git a\/(.+?) b\/(.+)$/;

// Extended header lines git and jj emit between `diff --git` and the first hunk
const EXTENDED_HEADER_RE =
  /^(index |old mode |new mode |similarity index |dissimilarity index |deleted file mode |new file mode |--- |\+\+\+ |rename from |rename to |copy from |copy to |GIT binary patch|literal |delta )/;

function newFile(match: RegExpExecArray, raw: string): DiffFile {
  const oldPath = match[1];
  const path = match[2];
  return {
    path,
    oldPath: oldPath !== path ? oldPath : undefined,
    change: oldPath !== path ? 'renamed' : 'modified',
    binary: false,
    stat: { added: 0, removed: 0 },
    hunks: [],
    raw,
  };
}

function applyExtendedHeader(file: DiffFile, line: string): void {
  if (line.startsWith('new file mode')) file.change = 'added';
  else if (line.startsWith('deleted file mode')) file.change = 'deleted';
  else if (line.startsWith('rename from ')) {
    file.change = 'renamed';
    file.oldPath = line.slice('rename from '.length);
  } else if (line.startsWith('rename to ')) file.path = line.slice('rename to '.length);
  else if (line.startsWith('copy from ')) {
    file.change = 'copied';
    file.oldPath = line.slice('copy from '.length);
  } else if (line.startsWith('copy to ')) file.path = line.slice('copy to '.length);
  else if (line.startsWith('GIT binary patch')) file.binary = true;
}

/**
 * Parse a unified diff into per-file blocks with hunk lines and
 * added/removed counts. Text before the first `diff --git` line, and lines
 * that fit no known shape, are returned as unparsed.
 */
export function parseDiff(output: string): DiffRecord {
  const files: DiffFile[] = [];
  const unparsed: UnparsedLine[] = [];
  let file: DiffFile | null = null;
  let inHunk = false;

  const lines = output.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

  for (const line of lines) {
    const header = DIFF_HEADER_RE.exec(line);
    if (header) {
      file = newFile(header, line);
      files.push(file);
      inHunk = false;
      continue;
    }

    if (!file) {
      if (line.trim() !== '') unparsed.push({ kind: 'unparsed', text: line });
      continue;
    }

    if (line.startsWith('@@')) {
      file.hunks.push({ header: line, lines: [] });
      inHunk = true;
      continue;
    }

    if (inHunk) {
      const hunk = file.hunks[file.hunks.length - 1];
      if (line.startsWith('+')) {
        file.stat.added++;
        hunk.lines.push(line);
      } else if (line.startsWith('-')) {
        file.stat.removed++;
        hunk.lines.push(line);
      } else if (line.startsWith(' ') || line === '' || line.startsWith('\\')) {
        hunk.lines.push(line);
      } else {
        unparsed.push({ kind: 'unparsed', text: line });
      }
      continue;
    }

    if (/^Binary files .* differ$/.test(line)) {
      file.binary = true;
      continue;
    }
    if (EXTENDED_HEADER_RE.test(line)) {
      applyExtendedHeader(file, line);
      continue;
    }

    if (line.trim() !== '') unparsed.push({ kind: 'unparsed', text: line });
  }

  return { files, unparsed };
}

/**
 * Parse the commit header printed by `jj show --git` or `git show` and the
 * diff that follows it.
 */
export function parseShow(output: string): ShowRecord {
  const lines = output.split('\n');
  let diffStart = lines.findIndex(l => l.startsWith('diff --git '));
  if (diffStart === -1) diffStart = lines.length;

  const headerLines = lines.slice(0, diffStart);
  const diff = parseDiff(lines.slice(diffStart).join('\n'));

  if (headerLines.every(l => l.trim() === '')) return { diff };

  const header: ShowHeader = { bookmarks: [], description: '', isEmpty: false, raw: '' };
  let described = false;
  const idLines: string[] = [];

  for (const line of headerLines) {
    const trimmed = line.trim();
    if (trimmed === '') continue;

    let match: RegExpExecArray | null;
    if ((match = /^Commit ID:\s*([0-9a-f]+)/.exec(trimmed))) {
      header.commitId = match[1];
      idLines.push(trimmed);
    } else if ((match = /^Change ID:\s*([0-9a-z]+)/.exec(trimmed))) {
      header.changeId = match[1];
      idLines.push(trimmed);
    } else if ((match = /^commit ([0-9a-f]{7,64})(?:\s+\((.*)\))?/.exec(trimmed))) {
      header.commitId = match[1];
      idLines.push(`commit ${match[1]}`);
      if (match[2]) {
        header.bookmarks.push(
          ...match[2].split(',').map(d => d.replace(/^HEAD -> /, '').trim()).filter(Boolean),
        );
      }
    } else if ((match = /^Bookmarks:\s*(.*)$/.exec(trimmed))) {
      header.bookmarks.push(...match[1].split(/\s+/).filter(Boolean));
    } else if ((match = /^Author\s*:\s*(.*)$/.exec(trimmed))) {
      // Name only: the address and date are dropped
      header.author = match[1].replace(/<[^>]*>.*$/, '').trim() || undefined;
    } else if (/^(Committer|Date|Merge|Tags)\s*:/.test(trimmed)) {
      continue;
    } else if (line.startsWith('    ') || line.startsWith('\t')) {
      if (!described) {
        const parts = parseDescription(trimmed);
        header.description = parts.description;
        header.isEmpty = parts.isEmpty;
        described = true;
      }
    } else {
      diff.unparsed.push({ kind: 'unparsed', text: line });
    }
  }

  header.raw = idLines.join('\n');
  return { header, diff };
}
