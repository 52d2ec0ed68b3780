// engine/logger.ts — Leveled stderr logger

const LOG_ENV_VAR = 'VCS_COMPACT_LOG';
const PREFIX = '[vcs-compact]';

export interface Logger {
  debug(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
  sink?: (line: string) => void;
}

function format(level: string, args: unknown[]): string {
  const msg = args.map(a => (typeof a === 'object' && a !== null ? JSON.stringify(a) : String(a))).join(' ');
  return `${PREFIX} ${level}: ${msg}`;
}

/**
 * Debug lines appear only with `--verbose` or VCS_COMPACT_LOG=1; errors
 * always do. Everything goes to stderr so stdout stays the
 * compacted output alone.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const env = options.env ?? process.env;
  const sink = options.sink ?? ((line: string) => console.error(line));
  const debugEnabled = options.verbose === true || env[LOG_ENV_VAR] === '1' || env[LOG_ENV_VAR] === 'true';

  return {
    debug: (...args) => {
      if (debugEnabled) sink(format('debug', args));
    },
    error: (...args) => sink(format('error', args)),
  };
}
