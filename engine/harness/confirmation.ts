// engine/harness/confirmation.ts — Write-command output -> one-line acknowledgment

import type { ConfirmationOutcome, FilterContext, RawOutput, WriteOp } from '../types.js';
import { looksLikeChangeId, splitChangeIdSuffix } from '../parsers/tokens.js';
import { shortenId } from '../formatters/text.js';

const OK = 'ok ✓';
const WARN = '⚠';

const WORKING_COPY_NOW_RE = /Working copy\s*(?:\(@\))?\s*now at:\s*(\S+)/;
const ID_PAIR_RE = /(?:^|\s)([k-z]{8,32})\s+[0-9a-f]{7,}(?:\s|$)/m;
const REBASED_RE = /Rebased (\d+) (?:descendant )?commits?/;
const ABSORBED_COUNT_RE = /Absorbed changes into (\d+) revisions?/;
const ABSORBED_LIST_RE = /Absorbed changes into these revisions:/;
const PART_RE = /^\s*\w+ part:/gm;
const UNDID_RE = /Undid operation:?\s+([0-9a-f]{7,})/;
const BOOKMARK_PUSH_RE = /(?:Move (?:forward |backward |sideways )?|Add |Delete )bookmark (\S+)/g;
const ARROW_RE = /(\S+)\s+->\s+\S+/;
const GIT_COMMIT_RE = /^\[\S+(?: \(root-commit\))? ([0-9a-f]{7,})\]/m;
const CONFLICTS_RE = /New conflicts appeared in/;

const REBASE_SOURCE_FLAGS = new Set(['-s', '--source', '-b', '--branch', '-r', '--revisions']);
const REBASE_DEST_FLAGS = new Set(['-d', '--destination', '-o', '--onto', '-A', '--insert-after', '-B', '--insert-before']);

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function ok(...tokens: Array<string | undefined>): string {
  return [OK, ...tokens.filter((t): t is string => t !== undefined && t !== '')].join(' ');
}

/** First value given to any of `flags`, as `-d x` or `--destination=x`. */
function flagValue(args: readonly string[], flags: ReadonlySet<string>): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (flags.has(arg) && i + 1 < args.length) return args[i + 1];
    const eq = arg.indexOf('=');
    if (eq !== -1 && flags.has(arg.slice(0, eq))) return arg.slice(eq + 1);
  }
  return undefined;
}

// --- Extractors ---

export function extractChangeId(text: string): string | undefined {
  const now = WORKING_COPY_NOW_RE.exec(text);
  if (now) return splitChangeIdSuffix(now[1]).id;
  const pair = ID_PAIR_RE.exec(text);
  return pair ? pair[1] : undefined;
}

export function extractRebasedCount(text: string): number | undefined {
  const match = REBASED_RE.exec(text);
  return match ? Number(match[1]) : undefined;
}

export function extractAbsorbedCount(text: string): number | undefined {
  const counted = ABSORBED_COUNT_RE.exec(text);
  if (counted) return Number(counted[1]);

  const lines = text.split('\n');
  const start = lines.findIndex(l => ABSORBED_LIST_RE.test(l));
  if (start === -1) return undefined;
  let count = 0;
  for (const line of lines.slice(start + 1)) {
    if (!/^\s+\S/.test(line)) break;
    count++;
  }
  return count;
}

export function extractSplitCount(text: string): number | undefined {
  const parts = text.match(PART_RE);
  return parts ? parts.length : undefined;
}

export function extractPushedBookmarks(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(BOOKMARK_PUSH_RE)) names.push(match[1]);
  if (names.length === 0) {
    for (const line of text.split('\n')) {
      const arrow = ARROW_RE.exec(line);
      if (arrow) names.push(arrow[1]);
    }
  }
  return [...new Set(names)];
}

/**
 * Count refs a fetch created and moved. Covers jj's
 * `bookmark: main@origin [updated] tracked` and git's
 * `* [new branch] feat -> origin/feat` / `a1b2c3d..e4f5a6b  main -> origin/main`.
 */
export function extractFetchCounts(text: string): { added: number; updated: number } {
  let added = 0;
  let updated = 0;
  for (const line of text.split('\n')) {
    if (/\[new[^\]]*\]/.test(line)) added++;
    else if (/\[(?:updated|forced update)\]/.test(line) || /^\s*\+?[0-9a-f]{7,}\.\.\.?[0-9a-f]{7,}\s/.test(line)) updated++;
  }
  return { added, updated };
}

/**
 * Change ids listed under jj's "New conflicts appeared in ..." notice.
 */
export function extractNewConflicts(text: string): string[] | undefined {
  const lines = text.split('\n');
  const start = lines.findIndex(l => CONFLICTS_RE.test(l));
  if (start === -1) return undefined;

  const ids: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (!/^\s+\S/.test(line)) break;
    const first = line.trim().split(/\s+/)[0];
    if (looksLikeChangeId(first)) ids.push(first);
  }
  return ids;
}

// --- Rendering ---

function acknowledge(op: WriteOp, args: readonly string[], text: string, ctx: FilterContext): string {
  const { shortId, opId } = ctx.config.truncation;
  const changeId = (): string | undefined => {
    const id = extractChangeId(text);
    return id !== undefined ? shortenId(id, shortId, ctx.verbose) : undefined;
  };

  switch (op) {
    case 'new':
    case 'describe':
    case 'edit':
      return ok(changeId());

    case 'commit': {
      const git = GIT_COMMIT_RE.exec(text);
      return ok(git ? git[1] : changeId());
    }

    case 'squash':
      return ok('squashed', changeId());

    case 'absorb': {
      const count = extractAbsorbedCount(text);
      return ok('absorbed', count !== undefined ? `into ${plural(count, 'revision')}` : undefined);
    }

    case 'rebase': {
      const count = extractRebasedCount(text);
      const source = flagValue(args, REBASE_SOURCE_FLAGS);
      const dest = flagValue(args, REBASE_DEST_FLAGS);
      return ok(
        'rebased',
        count !== undefined ? plural(count, 'commit') : undefined,
        source !== undefined ? `from ${source}` : undefined,
        dest !== undefined ? `onto ${dest}` : undefined,
      );
    }

    case 'split': {
      const count = extractSplitCount(text);
      return ok('split', count !== undefined ? `into ${count}` : undefined);
    }

    case 'undo': {
      const match = UNDID_RE.exec(text);
      return ok('undone', match ? shortenId(match[1], opId, ctx.verbose) : undefined);
    }

    case 'git-push': {
      const bookmarks = extractPushedBookmarks(text);
      return ok('pushed', bookmarks.join(', '));
    }

    case 'git-fetch': {
      const { added, updated } = extractFetchCounts(text);
      const counts = [added > 0 ? `${added} new` : '', updated > 0 ? `${updated} updated` : ''].filter(Boolean);
      return ok('fetched', counts.length > 0 ? `(${counts.join(', ')})` : undefined);
    }

    case 'bookmark-mutation':
      return OK;
  }
}

/**
 * Turn a write command's captured output into what the user sees.
 *
 * Success yields one `ok ✓ ...` line on stdout with the child's stderr
 * swallowed. Failure keeps every byte: `FAILED: <command>` and the raw
 * stdout on stdout, the raw stderr unchanged on stderr, and the child's
 * exit code (1 when it was killed by a signal).
 */
export function renderConfirmation(
  op: WriteOp,
  command: string,
  args: readonly string[],
  raw: RawOutput,
  ctx: FilterContext,
): ConfirmationOutcome {
  if (raw.exitStatus !== 0) {
    return {
      stdout: `FAILED: ${command}\n${raw.stdout}`,
      stderr: raw.stderr,
      exitCode: raw.exitStatus ?? 1,
    };
  }

  const text = `${raw.stdout}\n${raw.stderr}`;
  let line = acknowledge(op, args, text, ctx);

  const conflicts = extractNewConflicts(text);
  if (conflicts !== undefined) {
    const ids = conflicts.map(id => shortenId(id, ctx.config.truncation.shortId, ctx.verbose));
    line += ids.length > 0 ? ` ${WARN} conflicts: ${ids.join(', ')}` : ` ${WARN} conflicts`;
  }

  return { stdout: `${line}\n`, stderr: '', exitCode: 0 };
}
