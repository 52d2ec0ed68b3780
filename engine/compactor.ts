// engine/compactor.ts — Filter registry: parse -> render -> guard

import type { CompactResult, FilterContext, FilterKind, RawOutput, RenderedOutput } from './types.js';
import { parseStatus } from './parsers/status.js';
import { parseLog } from './parsers/log.js';
import { parseDiff, parseShow } from './parsers/diff.js';
import { parseOpLog } from './parsers/op-log.js';
import { parseBookmarks } from './parsers/bookmark.js';
import { renderStatus } from './formatters/status.js';
import { renderLog } from './formatters/log.js';
import { renderDiff, renderShow } from './formatters/diff.js';
import { renderOpLog } from './formatters/op-log.js';
import { renderBookmarks } from './formatters/bookmark.js';
import { checkFidelity } from './guard/fidelity-guard.js';

type Filter = (stdout: string, ctx: FilterContext) => RenderedOutput;

const FILTERS: Record<FilterKind, Filter> = {
  'status': (text, ctx) => renderStatus(parseStatus(text), ctx),
  'log': (text, ctx) => renderLog(parseLog(text), ctx),
  'diff': (text, ctx) => renderDiff(parseDiff(text), ctx),
  'show': (text, ctx) => renderShow(parseShow(text), ctx),
  'op-log': (text, ctx) => renderOpLog(parseOpLog(text, ctx.config.truncation.opId), ctx),
  'bookmark-list': (text, ctx) => renderBookmarks(parseBookmarks(text), ctx),
};

/**
 * Run the structured filter for `kind` over captured stdout.
 *
 * If the Fidelity Guard rejects the rendering, the raw stdout is returned
 * unchanged with `degradedToRaw` set.
 */
export function compactOutput(kind: FilterKind, raw: RawOutput, ctx: FilterContext): CompactResult {
  const rendered = FILTERS[kind](raw.stdout, ctx);
  const text = rendered.lines.join('\n');
  const verdict = checkFidelity(rendered, text, ctx.config);

  if (!verdict.ok) {
    const reason = verdict.reason === 'missing-identifiers'
      ? `missing identifiers: ${verdict.missing.join(', ')}`
      : 'too many unparsed lines';
    return { text: raw.stdout, degradedToRaw: true, reason };
  }

  return { text, degradedToRaw: false };
}
