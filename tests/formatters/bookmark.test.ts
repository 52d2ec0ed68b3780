import { describe, it, expect } from 'vitest';
import { formatBookmark, renderBookmarks } from '../../engine/formatters/bookmark.js';
import { parseBookmarks } from '../../engine/parsers/bookmark.js';
import { DEFAULT_CONFIG, finalizeConfig } from '../../engine/config.js';
import type { BookmarkEntry, FilterContext } from '../../engine/types.js';

const ctx: FilterContext = { config: DEFAULT_CONFIG, verbose: false };

const BOOKMARKS = [
  'feature-x: mpqrykyp 1a2b3c4d Add compact log renderer',
  '  @origin (ahead by 1 commits): mpqrykyp 0f0e0d0c old description',
  'main: rlvkpnrz 9e8f7a6b base',
  '  @git: rlvkpnrz 9e8f7a6b base',
  '  @origin: rlvkpnrz 9e8f7a6b base',
  'stale (deleted)',
  '  @origin: wvuxyzzk 1c2d3e4f gone',
].join('\n');

describe('formatBookmark', () => {
  it('renders name, ids and flags', () => {
    const entry: BookmarkEntry = {
      name: 'split',
      remotes: [],
      sides: [],
      deleted: false,
      conflicted: true,
      raw: 'split (conflicted):',
    };
    expect(formatBookmark(entry, ctx)).toBe('split (conflicted)');
  });

  it('lists the candidate targets of a conflicted bookmark', () => {
    const entry: BookmarkEntry = {
      name: 'split',
      remotes: [],
      sides: [
        { added: false, changeId: 'rlvkpnrz', commitId: '9e8f7a6b' },
        { added: true, changeId: 'kntqzsqt', commitId: '5e6f7a8b' },
        { added: true, changeId: 'wvuxyzzk', commitId: '1c2d3e4f' },
      ],
      deleted: false,
      conflicted: true,
      raw: 'split (conflicted):',
    };
    expect(formatBookmark(entry, ctx)).toBe('split (conflicted): -rlvkpnrz 9e8f7a6b +kntqzsqt 5e6f7a8b +wvuxyzzk 1c2d3e4f');
  });
});

describe('renderBookmarks', () => {
  it('renders one line per bookmark with tracking notes', () => {
    const out = renderBookmarks(parseBookmarks(BOOKMARKS), ctx);
    expect(out.lines).toEqual([
      'feature-x: mpqrykyp 1a2b3c4d (tracked @origin ahead by 1 commits)',
      'main: rlvkpnrz 9e8f7a6b (tracked @origin)',
      'stale (deleted) (tracked @origin wvuxyzzk 1c2d3e4f)',
    ]);
    expect(out.targets[0]).toEqual({ raw: 'feature-x: mpqrykyp 1a2b3c4d', kinds: ['bookmark', 'change', 'commit'] });
    expect(out.targets[2].raw).toBe('stale (deleted)\n  @origin: wvuxyzzk 1c2d3e4f');
  });

  it('caps the list at the bookmark limit', () => {
    const config = finalizeConfig({ ...DEFAULT_CONFIG, limits: { ...DEFAULT_CONFIG.limits, bookmarks: 1 } });
    const out = renderBookmarks(parseBookmarks(BOOKMARKS), { config, verbose: false });
    expect(out.lines).toEqual(['feature-x: mpqrykyp 1a2b3c4d (tracked @origin ahead by 1 commits)', '… 2 more']);
  });

  it('says so when there are no bookmarks', () => {
    expect(renderBookmarks({ items: [] }, ctx).lines).toEqual(['No bookmarks']);
  });
});
