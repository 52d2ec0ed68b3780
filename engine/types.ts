// engine/types.ts — Core type definitions for vcs-compact

// --- Configuration ---
export interface CompactConfig {
  limits: {
    log: number;
    opLog: number;
    statusFiles: number;
    bookmarks: number;
  };
  diff: {
    hunkLines: number;
    totalLines: number;
  };
  truncation: {
    message: number;
    opSummary: number;
    shortId: number;
    opId: number;
  };
  fidelity: {
    maxUnparsedRatio: number;
    minIdPrefix: number;
  };
}

/**
 * Immutable per-invocation settings handed to every parser and formatter.
 * `limit` is the entry count the caller asked for explicitly, if any.
 */
export interface FilterContext {
  readonly config: Readonly<CompactConfig>;
  readonly verbose: boolean;
  readonly limit?: number;
}

// --- Raw Capture ---
export type Backend = 'jj' | 'git';

export interface RawOutput {
  readonly stdout: string;
  readonly stderr: string;
  /** null when the process was terminated by a signal */
  readonly exitStatus: number | null;
}

// --- Classification ---
export type FilterKind = 'status' | 'log' | 'diff' | 'show' | 'op-log' | 'bookmark-list';

export type WriteOp =
  | 'new'
  | 'describe'
  | 'commit'
  | 'edit'
  | 'squash'
  | 'absorb'
  | 'rebase'
  | 'split'
  | 'undo'
  | 'git-push'
  | 'git-fetch'
  | 'bookmark-mutation';

/**
 * `command` is the label used in messages ("rebase", "git push"), `args`
 * the arguments after it, and `argv` the full argument list to spawn with.
 */
export type Classification =
  | { kind: 'filter'; filter: FilterKind; command: string; args: string[]; argv: string[] }
  | { kind: 'confirm'; op: WriteOp; command: string; args: string[]; argv: string[] }
  | { kind: 'passthrough'; reason: string; command: string; args: string[]; argv: string[] };

// --- Parsed Records ---
export interface LogEntry {
  glyph: string;
  changeId: string;
  /** `??` or `/N` after a divergent change id */
  changeIdSuffix?: string;
  commitId?: string;
  author?: string;
  timestamp?: string;
  bookmarks: string[];
  description: string;
  isEmpty: boolean;
  isConflicted: boolean;
  isDivergent: boolean;
  /** Header line as emitted upstream */
  raw: string;
}

/** A line no parser could make sense of; formatters echo it verbatim. */
export interface UnparsedLine {
  kind: 'unparsed';
  text: string;
}

export type LogItem = { kind: 'entry'; entry: LogEntry } | UnparsedLine;

export interface LogRecord {
  items: LogItem[];
}

export type FileChangeOp = 'Modified' | 'Added' | 'Deleted' | 'Renamed' | 'Copied' | 'Conflicted';

export interface FileChange {
  op: FileChangeOp;
  path: string;
}

export interface ConflictPath {
  path: string;
  sideCount: number;
}

export interface StatusRecord {
  workingCopy?: LogEntry;
  parents: LogEntry[];
  fileChanges: FileChange[];
  hasChanges: boolean;
  conflicts: ConflictPath[];
  unparsed: UnparsedLine[];
}

export interface HunkSection {
  header: string;
  lines: string[];
}

export interface DiffFile {
  path: string;
  oldPath?: string;
  change: 'modified' | 'added' | 'deleted' | 'renamed' | 'copied';
  binary: boolean;
  stat: { added: number; removed: number };
  hunks: HunkSection[];
  /** `diff --git` line as emitted upstream */
  raw: string;
}

export interface DiffRecord {
  files: DiffFile[];
  unparsed: UnparsedLine[];
}

export interface ShowHeader {
  changeId?: string;
  commitId?: string;
  bookmarks: string[];
  author?: string;
  description: string;
  isEmpty: boolean;
  /** Header lines carrying identifiers */
  raw: string;
}

export interface ShowRecord {
  header?: ShowHeader;
  diff: DiffRecord;
}

export interface OpLogEntry {
  glyph: string;
  shortOpId: string;
  fullOpId: string;
  user?: string;
  relativeTime: string;
  summary: string;
  args?: string;
  raw: string;
}

export type OpLogItem = { kind: 'entry'; entry: OpLogEntry } | UnparsedLine;

export interface OpLogRecord {
  items: OpLogItem[];
}

export interface RemoteTracking {
  remote: string;
  /** e.g. "ahead by 1 commits" */
  status?: string;
  changeId?: string;
  commitId?: string;
  /** Line text through its last id */
  head: string;
}

/** One `+`/`-` candidate of a conflicted bookmark */
export interface ConflictSide {
  added: boolean;
  changeId: string;
  commitId?: string;
}

export interface BookmarkEntry {
  name: string;
  changeId?: string;
  commitId?: string;
  remotes: RemoteTracking[];
  sides: ConflictSide[];
  deleted: boolean;
  conflicted: boolean;
  raw: string;
}

export type BookmarkItem = { kind: 'entry'; entry: BookmarkEntry } | UnparsedLine;

export interface BookmarkRecord {
  items: BookmarkItem[];
}

// --- Rendering & Fidelity ---
export type IdentifierKind = 'change' | 'commit' | 'operation' | 'bookmark';

/**
 * Raw text of one rendered entry and the identifier kinds the compact form
 * must keep for it.
 */
export interface GuardTarget {
  raw: string;
  kinds: IdentifierKind[];
}

export interface RenderedOutput {
  lines: string[];
  targets: GuardTarget[];
  parsedLines: number;
  unparsedLines: number;
  truncated: boolean;
}

export type FidelityVerdict =
  | { ok: true }
  | { ok: false; reason: 'unparsed-ratio' | 'missing-identifiers'; missing: string[] };

export interface CompactResult {
  text: string;
  degradedToRaw: boolean;
  reason?: string;
}

// --- Confirmation ---
export interface ConfirmationOutcome {
  stdout: string;
  stderr: string;
  exitCode: number;
}
