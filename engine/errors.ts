// engine/errors.ts — Error types surfaced by the harness

/**
 * Thrown when the VCS binary cannot be started at all (missing from PATH,
 * not executable). Non-zero exits are not errors and never produce this.
 */
export class SpawnError extends Error {
  readonly binary: string;
  readonly code: string | undefined;

  constructor(binary: string, cause: NodeJS.ErrnoException) {
    const hint = cause.code === 'ENOENT' ? ` (is '${binary}' installed and on PATH?)` : '';
    super(`Failed to run ${binary}: ${cause.message}${hint}`);
    this.name = 'SpawnError';
    this.binary = binary;
    this.code = cause.code;
  }
}

/**
 * Thrown when a config file cannot be read or fails validation.
 */
export class ConfigError extends Error {
  readonly configPath: string;
  readonly errors: string[];

  constructor(configPath: string, errors: string[]) {
    super(`Invalid vcs-compact config (${configPath}):\n${errors.join('\n')}`);
    this.name = 'ConfigError';
    this.configPath = configPath;
    this.errors = errors;
  }
}
