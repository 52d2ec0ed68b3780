// engine/harness/classifier.ts — argv -> filter | confirm | passthrough

import type { Backend, Classification, FilterKind, WriteOp } from '../types.js';

// --- Flag tables ---

/** jj global options that take a value as the next argument */
const JJ_VALUE_GLOBALS = new Set(['-R', '--repository', '--at-op', '--at-operation', '--config', '--config-toml', '--config-file', '--color']);

/** git global options that take a value as the next argument */
const GIT_VALUE_GLOBALS = new Set(['-C', '-c', '--git-dir', '--work-tree', '--namespace', '--exec-path']);

const HELP_FLAGS = ['-h', '--help', '--version', '-V'];

/** Change the rendering of any jj command */
const JJ_SHAPE_FLAGS = ['-T', '--template', '--color', '--config', '--config-toml', '--config-file'];

const JJ_INTERACTIVE_FLAGS = ['-i', '--interactive', '--tool'];

const JJ_LOG_SHAPE_FLAGS = ['--no-graph', '-G', '-p', '--patch', '--stat', '-s', '--summary', '--git', '--color-words', '--types', '--name-only'];

const JJ_DIFF_FORMAT_FLAGS = ['--stat', '-s', '--summary', '--types', '--name-only', '--color-words', '--tool'];

const JJ_OP_LOG_SHAPE_FLAGS = ['--no-graph', '-G', '-p', '--patch', '-d', '--op-diff'];

const GIT_SHAPE_FLAGS = [
  '--color', '--format', '--pretty', '--oneline', '--stat', '--numstat', '--shortstat', '--name-only',
  '--name-status', '--word-diff', '--color-words', '--raw', '--summary', '--patch-with-stat',
  '--ext-diff', '--compact-summary', '--dirstat', '--no-patch', '-s', '-z',
];

const JJ_BOOKMARK_MUTATIONS = new Set([
  'set', 's', 'create', 'c', 'move', 'm', 'delete', 'd', 'forget', 'f', 'rename', 'r', 'track', 't', 'untrack',
]);

const JJ_CONFIRM: Record<string, WriteOp> = {
  new: 'new',
  describe: 'describe',
  desc: 'describe',
  commit: 'commit',
  ci: 'commit',
  edit: 'edit',
  squash: 'squash',
  absorb: 'absorb',
  rebase: 'rebase',
  split: 'split',
  undo: 'undo',
};

/** Options of `jj split` that consume the following argument */
const SPLIT_VALUE_FLAGS = new Set([
  '-r', '--revision', '-m', '--message', '-d', '--destination', '-o', '--onto',
  '-A', '--insert-after', '--after', '-B', '--insert-before', '--before', '--tool',
]);

// --- Flag helpers ---

/**
 * True when `arg` is `flag` itself, `--flag=value`, or for a two-letter
 * short flag with an attached value (`-Tbuiltin_log_oneline`).
 */
function matchesFlag(arg: string, flag: string): boolean {
  if (arg === flag) return true;
  if (flag.startsWith('--')) return arg.startsWith(`${flag}=`);
  return flag === '-T' && arg.startsWith('-T');
}

function hasFlag(args: readonly string[], flags: readonly string[]): string | undefined {
  for (const arg of args) {
    if (arg === '--') return undefined;
    const hit = flags.find(f => matchesFlag(arg, f));
    if (hit !== undefined) return hit;
  }
  return undefined;
}

/** `-m msg`, `-mmsg`, clustered `-am`, `--message[=msg]` or `--stdin` */
function hasMessage(args: readonly string[]): boolean {
  return args.some(a => /^-[a-zA-Z]*m/.test(a) || matchesFlag(a, '--message') || a === '--stdin');
}

/**
 * Parse `-n N`, `-nN`, `--limit N` or `--limit=N` from VCS arguments.
 * Returns undefined when absent or not a positive integer.
 */
export function readLimit(args: readonly string[]): number | undefined {
  let value: string | undefined;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') break;
    if (arg === '-n' || arg === '--limit') value = args[i + 1];
    else if (arg.startsWith('--limit=')) value = arg.slice('--limit='.length);
    else if (/^-n\d+$/.test(arg)) value = arg.slice(2);
  }
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  const n = Number(value);
  return n > 0 ? n : undefined;
}

function subcommandIndex(argv: readonly string[], valueGlobals: ReadonlySet<string>): number {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (valueGlobals.has(arg)) {
      i++;
      continue;
    }
    if (!arg.startsWith('-')) return i;
  }
  return -1;
}

function positionals(args: readonly string[], valueFlags: ReadonlySet<string>): string[] {
  const found: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      found.push(...args.slice(i + 1));
      break;
    }
    if (valueFlags.has(arg)) {
      i++;
      continue;
    }
    if (!arg.startsWith('-')) found.push(arg);
  }
  return found;
}

/**
 * Insert `--git` right after the subcommand so jj emits a unified diff.
 * Placing it before any `--` keeps it from being read as a path.
 */
function withGitFormat(argv: readonly string[], index: number): string[] {
  if (argv.includes('--git')) return [...argv];
  return [...argv.slice(0, index + 1), '--git', ...argv.slice(index + 1)];
}

// --- Classification ---

function passthrough(reason: string, command: string, args: string[], argv: readonly string[]): Classification {
  return { kind: 'passthrough', reason, command, args, argv: [...argv] };
}

function filter(kind: FilterKind, command: string, args: string[], argv: string[]): Classification {
  return { kind: 'filter', filter: kind, command, args, argv };
}

function confirm(op: WriteOp, command: string, args: string[], argv: readonly string[]): Classification {
  return { kind: 'confirm', op, command, args, argv: [...argv] };
}

function classifyJj(argv: readonly string[]): Classification {
  const index = subcommandIndex(argv, JJ_VALUE_GLOBALS);

  const help = hasFlag(argv, HELP_FLAGS);
  if (help !== undefined) return passthrough(`help flag ${help}`, argv[index] ?? '', [], argv);
  if (index === -1) return passthrough('no subcommand', '', [], argv);

  const sub = argv[index];
  const args = argv.slice(index + 1);

  const shape = hasFlag(argv, JJ_SHAPE_FLAGS);
  if (shape !== undefined) return passthrough(`output-shape flag ${shape}`, sub, args, argv);

  const interactive = hasFlag(args, JJ_INTERACTIVE_FLAGS);
  if (interactive !== undefined) return passthrough(`interactive flag ${interactive}`, sub, args, argv);

  switch (sub) {
    case 'status':
    case 'st':
      return filter('status', sub, args, [...argv]);

    case 'log': {
      const flag = hasFlag(args, JJ_LOG_SHAPE_FLAGS);
      if (flag !== undefined) return passthrough(`output-shape flag ${flag}`, sub, args, argv);
      return filter('log', sub, args, [...argv]);
    }

    case 'diff':
    case 'show': {
      const flag = hasFlag(args, JJ_DIFF_FORMAT_FLAGS);
      if (flag !== undefined) return passthrough(`output-shape flag ${flag}`, sub, args, argv);
      return filter(sub === 'diff' ? 'diff' : 'show', sub, args, withGitFormat(argv, index));
    }

    case 'op':
    case 'operation': {
      const verb = args[0];
      const command = `op ${verb ?? ''}`.trim();
      if (verb !== 'log') return passthrough('operation subcommand without a filter', command, args.slice(1), argv);
      const flag = hasFlag(args, JJ_OP_LOG_SHAPE_FLAGS);
      if (flag !== undefined) return passthrough(`output-shape flag ${flag}`, command, args.slice(1), argv);
      return filter('op-log', command, args.slice(1), [...argv]);
    }

    case 'bookmark':
    case 'b': {
      const verb = args.find(a => !a.startsWith('-'));
      if (verb === undefined || verb === 'list' || verb === 'l') {
        return filter('bookmark-list', verb === undefined ? 'bookmark' : `bookmark ${verb}`, args, [...argv]);
      }
      if (JJ_BOOKMARK_MUTATIONS.has(verb)) {
        return confirm('bookmark-mutation', `bookmark ${verb}`, args.slice(args.indexOf(verb) + 1), argv);
      }
      return passthrough('unknown bookmark subcommand', `bookmark ${verb}`, args, argv);
    }

    case 'git': {
      const verb = args.find(a => !a.startsWith('-'));
      const command = `git ${verb ?? ''}`.trim();
      const rest = verb === undefined ? args : args.slice(args.indexOf(verb) + 1);
      if (verb === 'push') {
        if (hasFlag(rest, ['--dry-run']) !== undefined) return passthrough('dry run', command, rest, argv);
        return confirm('git-push', command, rest, argv);
      }
      if (verb === 'fetch') return confirm('git-fetch', command, rest, argv);
      return passthrough('git subcommand without a filter', command, rest, argv);
    }

    case 'diffedit':
      return passthrough('interactive command', sub, args, argv);

    case 'resolve':
      return passthrough(hasFlag(args, ['-l', '--list']) ? 'conflict listing' : 'interactive command', sub, args, argv);

    default:
      break;
  }

  const op = JJ_CONFIRM[sub];
  if (op === undefined) return passthrough('unknown subcommand', sub, args, argv);

  if ((op === 'describe' || op === 'commit') && !hasMessage(args)) {
    return passthrough('opens an editor', sub, args, argv);
  }
  // Combining two described revisions asks for the new description
  if (op === 'squash' && !hasMessage(args) && hasFlag(args, ['-u', '--use-destination-message']) === undefined) {
    return passthrough('may open an editor', sub, args, argv);
  }
  if (op === 'split') {
    if (positionals(args, SPLIT_VALUE_FLAGS).length === 0) return passthrough('split without fileset', sub, args, argv);
    if (!hasMessage(args)) return passthrough('opens an editor', sub, args, argv);
  }
  return confirm(op, sub, args, argv);
}

function classifyGit(argv: readonly string[]): Classification {
  const index = subcommandIndex(argv, GIT_VALUE_GLOBALS);

  const help = hasFlag(argv, HELP_FLAGS);
  if (help !== undefined) return passthrough(`help flag ${help}`, 'git', [], argv);
  if (index === -1) return passthrough('no subcommand', 'git', [], argv);

  const sub = argv[index];
  const command = `git ${sub}`;
  const args = argv.slice(index + 1);

  switch (sub) {
    case 'diff':
    case 'show': {
      const flag = hasFlag(args, GIT_SHAPE_FLAGS);
      if (flag !== undefined) return passthrough(`output-shape flag ${flag}`, command, args, argv);
      return filter(sub === 'diff' ? 'diff' : 'show', command, args, [...argv]);
    }
    case 'commit': {
      const interactive = hasFlag(args, ['-i', '--interactive', '-p', '--patch', '-e', '--edit']);
      if (interactive !== undefined) return passthrough(`interactive flag ${interactive}`, command, args, argv);
      if (!hasMessage(args) && hasFlag(args, ['-F', '--file', '--no-edit', '-C', '--reuse-message']) === undefined) {
        return passthrough('opens an editor', command, args, argv);
      }
      return confirm('commit', command, args, argv);
    }
    case 'push': {
      const dryRun = hasFlag(args, ['-n', '--dry-run']);
      if (dryRun !== undefined) return passthrough('dry run', command, args, argv);
      return confirm('git-push', command, args, argv);
    }
    case 'fetch':
      return confirm('git-fetch', command, args, argv);
    default:
      return passthrough('no compact form', command, args, argv);
  }
}

/**
 * Decide how an invocation is handled. Pure: argv is never modified, and
 * the returned `argv` is what gets spawned.
 */
export function classify(backend: Backend, argv: readonly string[]): Classification {
  return backend === 'jj' ? classifyJj(argv) : classifyGit(argv);
}
