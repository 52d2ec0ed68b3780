import { describe, it, expect } from 'vitest';
import { classify, readLimit } from '../../engine/harness/classifier.js';

describe('classify (jj)', () => {
  it('routes read commands to their filters', () => {
    expect(classify('jj', ['status'])).toMatchObject({ kind: 'filter', filter: 'status' });
    expect(classify('jj', ['st'])).toMatchObject({ kind: 'filter', filter: 'status' });
    expect(classify('jj', ['log', '-r', '::@'])).toMatchObject({ kind: 'filter', filter: 'log', args: ['-r', '::@'] });
    expect(classify('jj', ['op', 'log'])).toMatchObject({ kind: 'filter', filter: 'op-log', command: 'op log' });
    expect(classify('jj', ['bookmark', 'list'])).toMatchObject({ kind: 'filter', filter: 'bookmark-list' });
    expect(classify('jj', ['b', 'l'])).toMatchObject({ kind: 'filter', filter: 'bookmark-list' });
    expect(classify('jj', ['bookmark'])).toMatchObject({ kind: 'filter', filter: 'bookmark-list' });
  });

  it('asks jj for a git-format diff', () => {
    expect(classify('jj', ['diff']).argv).toEqual(['diff', '--git']);
    expect(classify('jj', ['show', '@-']).argv).toEqual(['show', '--git', '@-']);
    expect(classify('jj', ['diff', '--', 'src/a.ts']).argv).toEqual(['diff', '--git', '--', 'src/a.ts']);
    expect(classify('jj', ['diff', '--git']).argv).toEqual(['diff', '--git']);
  });

  it('finds the subcommand after global options', () => {
    const result = classify('jj', ['-R', '../other', 'log']);
    expect(result).toMatchObject({ kind: 'filter', filter: 'log', args: [] });
    expect(result.argv).toEqual(['-R', '../other', 'log']);
  });

  it('routes write commands to confirmations', () => {
    expect(classify('jj', ['new'])).toMatchObject({ kind: 'confirm', op: 'new' });
    expect(classify('jj', ['describe', '-m', 'msg'])).toMatchObject({ kind: 'confirm', op: 'describe' });
    expect(classify('jj', ['desc', '--message=msg'])).toMatchObject({ kind: 'confirm', op: 'describe' });
    expect(classify('jj', ['commit', '-m', 'msg'])).toMatchObject({ kind: 'confirm', op: 'commit' });
    expect(classify('jj', ['squash', '-m', 'msg'])).toMatchObject({ kind: 'confirm', op: 'squash' });
    expect(classify('jj', ['squash', '-u'])).toMatchObject({ kind: 'confirm', op: 'squash' });
    expect(classify('jj', ['absorb'])).toMatchObject({ kind: 'confirm', op: 'absorb' });
    expect(classify('jj', ['rebase', '-s', 'x', '-d', 'main'])).toMatchObject({
      kind: 'confirm',
      op: 'rebase',
      command: 'rebase',
      args: ['-s', 'x', '-d', 'main'],
    });
    expect(classify('jj', ['edit', 'xyz'])).toMatchObject({ kind: 'confirm', op: 'edit' });
    expect(classify('jj', ['undo'])).toMatchObject({ kind: 'confirm', op: 'undo' });
    expect(classify('jj', ['split', '-m', 'first', 'src/a.ts'])).toMatchObject({ kind: 'confirm', op: 'split' });
  });

  it('routes git and bookmark mutations to confirmations', () => {
    expect(classify('jj', ['git', 'push'])).toMatchObject({ kind: 'confirm', op: 'git-push', command: 'git push' });
    expect(classify('jj', ['git', 'fetch'])).toMatchObject({ kind: 'confirm', op: 'git-fetch' });
    expect(classify('jj', ['bookmark', 'set', 'main', '-r', '@'])).toMatchObject({
      kind: 'confirm',
      op: 'bookmark-mutation',
      command: 'bookmark set',
      args: ['main', '-r', '@'],
    });
    expect(classify('jj', ['b', 'c', 'topic'])).toMatchObject({ kind: 'confirm', op: 'bookmark-mutation' });
  });

  it('passes through output-shape flags', () => {
    expect(classify('jj', ['log', '-T', 'builtin_log_oneline']).kind).toBe('passthrough');
    expect(classify('jj', ['log', '-Tbuiltin_log_oneline']).kind).toBe('passthrough');
    expect(classify('jj', ['log', '--template=x']).kind).toBe('passthrough');
    expect(classify('jj', ['--color', 'always', 'status']).kind).toBe('passthrough');
    expect(classify('jj', ['log', '--no-graph']).kind).toBe('passthrough');
    expect(classify('jj', ['log', '-p']).kind).toBe('passthrough');
    expect(classify('jj', ['diff', '--stat']).kind).toBe('passthrough');
    expect(classify('jj', ['show', '--summary']).kind).toBe('passthrough');
  });

  it('passes through interactive commands', () => {
    expect(classify('jj', ['squash', '-i']).kind).toBe('passthrough');
    expect(classify('jj', ['split']).kind).toBe('passthrough');
    expect(classify('jj', ['split', '-r', '@-']).kind).toBe('passthrough');
    expect(classify('jj', ['describe']).kind).toBe('passthrough');
    expect(classify('jj', ['commit']).kind).toBe('passthrough');
    expect(classify('jj', ['diffedit']).kind).toBe('passthrough');
    expect(classify('jj', ['resolve']).kind).toBe('passthrough');
    expect(classify('jj', ['resolve', '--list']).kind).toBe('passthrough');
  });

  it('passes through a squash that may ask for a description', () => {
    expect(classify('jj', ['squash'])).toMatchObject({ kind: 'passthrough', reason: 'may open an editor' });
    expect(classify('jj', ['squash', '--into', '@--'])).toMatchObject({ kind: 'passthrough', reason: 'may open an editor' });
  });

  it('passes through a dry-run push', () => {
    expect(classify('jj', ['git', 'push', '--dry-run'])).toMatchObject({ kind: 'passthrough', reason: 'dry run', command: 'git push' });
    expect(classify('jj', ['git', 'push', '-b', 'main', '--dry-run']).kind).toBe('passthrough');
  });

  it('passes through help, version and unknown commands', () => {
    expect(classify('jj', ['log', '--help'])).toMatchObject({ kind: 'passthrough', reason: 'help flag --help' });
    expect(classify('jj', ['--version']).kind).toBe('passthrough');
    expect(classify('jj', ['workspace', 'list'])).toMatchObject({ kind: 'passthrough', reason: 'unknown subcommand' });
    expect(classify('jj', ['op', 'restore', 'abc'])).toMatchObject({ kind: 'passthrough', command: 'op restore' });
    expect(classify('jj', [])).toMatchObject({ kind: 'passthrough', reason: 'no subcommand' });
  });

  it('does not read flags after -- as options', () => {
    expect(classify('jj', ['log', '--', '-p']).kind).toBe('filter');
  });

  it('never modifies its input', () => {
    const argv = ['diff', '-r', '@-'];
    classify('jj', argv);
    expect(argv).toEqual(['diff', '-r', '@-']);
  });
});

describe('classify (git)', () => {
  it('filters diff and show', () => {
    expect(classify('git', ['diff', 'HEAD~1'])).toMatchObject({ kind: 'filter', filter: 'diff', command: 'git diff' });
    expect(classify('git', ['-C', 'repo', 'show'])).toMatchObject({ kind: 'filter', filter: 'show' });
    expect(classify('git', ['diff']).argv).toEqual(['diff']);
  });

  it('confirms commit with a message, push and fetch', () => {
    expect(classify('git', ['commit', '-m', 'msg'])).toMatchObject({ kind: 'confirm', op: 'commit' });
    expect(classify('git', ['commit', '-am', 'msg'])).toMatchObject({ kind: 'confirm', op: 'commit' });
    expect(classify('git', ['push', 'origin', 'main'])).toMatchObject({ kind: 'confirm', op: 'git-push' });
    expect(classify('git', ['fetch'])).toMatchObject({ kind: 'confirm', op: 'git-fetch' });
  });

  it('passes through everything else', () => {
    expect(classify('git', ['commit']).kind).toBe('passthrough');
    expect(classify('git', ['commit', '-p', '-m', 'msg']).kind).toBe('passthrough');
    expect(classify('git', ['diff', '--stat']).kind).toBe('passthrough');
    expect(classify('git', ['log'])).toMatchObject({ kind: 'passthrough', reason: 'no compact form' });
    expect(classify('git', ['status']).kind).toBe('passthrough');
    expect(classify('git', ['push', '-n', 'origin', 'main'])).toMatchObject({ kind: 'passthrough', reason: 'dry run' });
    expect(classify('git', ['push', '--dry-run'])).toMatchObject({ kind: 'passthrough', reason: 'dry run' });
  });
});

describe('readLimit', () => {
  it('reads every spelling of the limit option', () => {
    expect(readLimit(['-n', '3'])).toBe(3);
    expect(readLimit(['-n3'])).toBe(3);
    expect(readLimit(['--limit', '4'])).toBe(4);
    expect(readLimit(['--limit=5'])).toBe(5);
  });

  it('ignores missing or invalid values', () => {
    expect(readLimit([])).toBeUndefined();
    expect(readLimit(['-n', 'x'])).toBeUndefined();
    expect(readLimit(['-n', '0'])).toBeUndefined();
    expect(readLimit(['--', '-n', '3'])).toBeUndefined();
  });
});
