// engine/parsers/status.ts — Working-copy status text -> StatusRecord

import type { FileChange, FileChangeOp, LogEntry, StatusRecord } from '../types.js';
import { looksLikeShortId, parseDescription, splitChangeIdSuffix } from './tokens.js';

const OP_BY_LETTER: Record<string, FileChangeOp> = {
  M: 'Modified',
  A: 'Added',
  D: 'Deleted',
  R: 'Renamed',
  C: 'Copied',
};

const WORKING_COPY_RE = /^Working copy\s*(?:\(@\))?\s*:\s*(.*)$/;
const PARENT_RE = /^Parent commit\s*(?:\(@-\))?\s*:\s*(.*)$/;
const CHANGE_RE = /^([MADRC])\s+(\S.*)$/;
const CONFLICT_RE = /^(.+?)\s+(\d+)-sided conflict\b/;

/**
 * Parse the one-line commit summary jj prints after "Working copy (@) :",
 * "Parent commit (@-):" and "Working copy now at:", e.g.
 * `orrkosyo 7fd1a60b master | (empty) Merge pull request #6`.
 */
export function parseCommitSummary(text: string, label: string, glyph: string): LogEntry | null {
  const tokens = text.trim().split(/\s+/).filter(Boolean);
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
    raw: '',
  };

  let remainder = tokens.slice(1).join(' ');
  if (tokens.length > 1 && looksLikeShortId(tokens[1])) {
    entry.commitId = tokens[1];
    remainder = tokens.slice(2).join(' ');
  }

  // Identifier-bearing head only; the description never carries required ids
  let head = tokens.slice(0, entry.commitId ? 2 : 1).join(' ');

  const pipe = remainder.indexOf(' | ');
  let descriptionText = remainder;
  if (pipe !== -1 || remainder.endsWith(' |')) {
    const cut = pipe !== -1 ? pipe : remainder.length - 2;
    for (const word of remainder.slice(0, cut).split(/\s+/).filter(Boolean)) {
      if (word === 'conflict') entry.isConflicted = true;
      else if (word === 'divergent') entry.isDivergent = true;
      else entry.bookmarks.push(word);
    }
    descriptionText = remainder.slice(cut + 3);
    head = `${head} ${remainder.slice(0, cut).trim()}`.trim();
  }
  entry.raw = `${label} ${head}`.trim();

  const parts = parseDescription(descriptionText);
  entry.description = parts.description;
  entry.isEmpty = parts.isEmpty;
  entry.isConflicted = entry.isConflicted || parts.isConflicted;
  entry.isDivergent = entry.isDivergent || parts.isDivergent;
  return entry;
}

function labelOf(line: string, captured: string): string {
  return line.slice(0, line.length - captured.length).trim();
}

/**
 * Parse `jj status` output.
 *
 * Recognized: the "no changes" banner, the changes header and its
 * `<letter> <path>` lines, the working-copy and parent lines (one per
 * parent on merges), and the unresolved-conflicts section. Hints are
 * dropped. Any other line is kept as unparsed.
 */
export function parseStatus(output: string): StatusRecord {
  const record: StatusRecord = {
    parents: [],
    fileChanges: [],
    hasChanges: false,
    conflicts: [],
    unparsed: [],
  };

  let noChangesBanner = false;
  let changesHeader = false;
  let inConflicts = false;

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '') continue;

    if (trimmed.startsWith('The working copy has no changes')) {
      noChangesBanner = true;
      continue;
    }
    if (trimmed.startsWith('Working copy changes')) {
      changesHeader = true;
      inConflicts = false;
      continue;
    }
    if (trimmed.startsWith('Hint:') || /^Rebased \d+/.test(trimmed)) continue;
    if (/unresolved conflicts at these paths/.test(trimmed)) {
      inConflicts = true;
      continue;
    }

    const wc = WORKING_COPY_RE.exec(trimmed);
    if (wc) {
      inConflicts = false;
      const entry = parseCommitSummary(wc[1], labelOf(trimmed, wc[1]), '@');
      if (entry) record.workingCopy = entry;
      else record.unparsed.push({ kind: 'unparsed', text: line });
      continue;
    }

    const parent = PARENT_RE.exec(trimmed);
    if (parent) {
      inConflicts = false;
      const entry = parseCommitSummary(parent[1], labelOf(trimmed, parent[1]), '@-');
      if (entry) record.parents.push(entry);
      else record.unparsed.push({ kind: 'unparsed', text: line });
      continue;
    }

    if (inConflicts) {
      const conflict = CONFLICT_RE.exec(trimmed);
      if (conflict) {
        record.conflicts.push({ path: conflict[1], sideCount: Number(conflict[2]) });
        continue;
      }
    }

    const change = CHANGE_RE.exec(trimmed);
    if (change) {
      record.fileChanges.push({ op: OP_BY_LETTER[change[1]], path: change[2] });
      continue;
    }

    record.unparsed.push({ kind: 'unparsed', text: line });
  }

  const conflicted = new Set(record.conflicts.map(c => c.path));
  record.fileChanges = record.fileChanges.map((fc): FileChange =>
    conflicted.has(fc.path) ? { op: 'Conflicted', path: fc.path } : fc,
  );
  record.hasChanges = !noChangesBanner && (changesHeader || record.fileChanges.length > 0);

  return record;
}
