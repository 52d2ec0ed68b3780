import { describe, it, expect } from 'vitest';
import { parseStatus, parseCommitSummary } from '../../engine/parsers/status.js';

const CLEAN = [
  'The working copy has no changes.',
  'Working copy  (@) : qpvuntsm 4a5b6c7d (empty) (no description set)',
  'Parent commit (@-): rlvkpnrz 9e8f7a6b main | Add parser',
  '',
].join('\n');

const CONFLICTED = [
  'Working copy changes:',
  'M src/a.ts',
  'A src/b.ts',
  'Working copy  (@) : qpvuntsm 4a5b6c7d (conflict) Merge topic',
  'Parent commit (@-): rlvkpnrz 9e8f7a6b main | base',
  'Parent commit (@-): wvuxyzzk 1c2d3e4f topic | side',
  'Warning: There are unresolved conflicts at these paths:',
  'src/a.ts    2-sided conflict',
  'Hint: Use `jj resolve` to resolve the conflicts.',
].join('\n');

describe('parseStatus', () => {
  it('parses a clean working copy', () => {
    const record = parseStatus(CLEAN);
    expect(record.hasChanges).toBe(false);
    expect(record.fileChanges).toEqual([]);
    expect(record.workingCopy?.changeId).toBe('qpvuntsm');
    expect(record.workingCopy?.commitId).toBe('4a5b6c7d');
    expect(record.workingCopy?.isEmpty).toBe(true);
    expect(record.unparsed).toEqual([]);
  });

  it('splits the parent summary at the pipe', () => {
    const [parent] = parseStatus(CLEAN).parents;
    expect(parent.bookmarks).toEqual(['main']);
    expect(parent.description).toBe('Add parser');
    expect(parent.raw).toBe('Parent commit (@-): rlvkpnrz 9e8f7a6b main');
  });

  it('collects file changes, merge parents and conflicts', () => {
    const record = parseStatus(CONFLICTED);
    expect(record.hasChanges).toBe(true);
    expect(record.fileChanges).toEqual([
      { op: 'Conflicted', path: 'src/a.ts' },
      { op: 'Added', path: 'src/b.ts' },
    ]);
    expect(record.parents.map(p => p.changeId)).toEqual(['rlvkpnrz', 'wvuxyzzk']);
    expect(record.conflicts).toEqual([{ path: 'src/a.ts', sideCount: 2 }]);
    expect(record.workingCopy?.isConflicted).toBe(true);
    expect(record.workingCopy?.description).toBe('Merge topic');
  });

  it('drops hints and keeps unknown lines as unparsed', () => {
    const record = parseStatus(CONFLICTED + '\nsomething new from a future release');
    expect(record.unparsed).toEqual([{ kind: 'unparsed', text: 'something new from a future release' }]);
  });
});

describe('parseCommitSummary', () => {
  it('reads the summary printed after "Working copy now at:"', () => {
    const entry = parseCommitSummary('puqltutt 3f2a1b4c (empty) (no description set)', 'Working copy now at:', '@');
    expect(entry?.changeId).toBe('puqltutt');
    expect(entry?.commitId).toBe('3f2a1b4c');
    expect(entry?.raw).toBe('Working copy now at: puqltutt 3f2a1b4c');
  });

  it('returns null for text without an id', () => {
    expect(parseCommitSummary('(no commit)', 'Parent commit:', '@-')).toBeNull();
  });
});
