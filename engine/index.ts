// engine/index.ts — Top-level orchestrator: classify -> capture -> compact | confirm | pass through

import type { Backend, CompactConfig, FilterContext } from './types.js';
import { classify, readLimit } from './harness/classifier.js';
import { renderConfirmation } from './harness/confirmation.js';
import type { CommandRunner } from './harness/process.js';
import { compactOutput } from './compactor.js';
import type { Logger } from './logger.js';

export { classify, readLimit } from './harness/classifier.js';
export { renderConfirmation } from './harness/confirmation.js';
export { nodeRunner } from './harness/process.js';
export type { CommandRunner } from './harness/process.js';
export { compactOutput } from './compactor.js';
export { checkFidelity } from './guard/fidelity-guard.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { DEFAULT_CONFIG, loadConfig, finalizeConfig, resolveConfigPath, validateConfig } from './config.js';
export { SpawnError, ConfigError } from './errors.js';
export type * from './types.js';

// ---- Harness ----

export interface Invocation {
  backend: Backend;
  /** Arguments for the VCS, verbatim */
  argv: string[];
  config: Readonly<CompactConfig>;
  verbose: boolean;
  /** Entry limit given to vcs-compact itself (`--limit`) */
  limit?: number;
}

export interface OutputSink {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface RunDeps {
  runner: CommandRunner;
  output: OutputSink;
  logger: Logger;
}

function withNewline(text: string): string {
  return text === '' || text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * Execute one VCS invocation and write what the user should see.
 * Resolves to the process exit code. Spawn failures reject with SpawnError.
 */
export async function run(invocation: Invocation, deps: RunDeps): Promise<number> {
  const { backend, config, verbose } = invocation;
  const { runner, output, logger } = deps;

  const classification = classify(backend, invocation.argv);
  logger.debug(`${backend} ${invocation.argv.join(' ')} -> ${classification.kind}`);

  if (classification.kind === 'passthrough') {
    logger.debug(`passthrough: ${classification.reason}`);
    return runner.passthrough(backend, classification.argv);
  }

  const raw = await runner.capture(backend, classification.argv);

  if (classification.kind === 'confirm') {
    const ctx: FilterContext = { config, verbose };
    const outcome = renderConfirmation(classification.op, classification.command, classification.args, raw, ctx);
    if (outcome.stdout !== '') output.stdout(outcome.stdout);
    if (outcome.stderr !== '') output.stderr(outcome.stderr);
    return outcome.exitCode;
  }

  if (raw.exitStatus !== 0) {
    logger.debug(`${classification.command} exited with ${raw.exitStatus ?? 'a signal'}; forwarding raw output`);
    if (raw.stdout !== '') output.stdout(raw.stdout);
    if (raw.stderr !== '') output.stderr(raw.stderr);
    return raw.exitStatus ?? 1;
  }

  const usesLimit = classification.filter === 'log' || classification.filter === 'op-log';
  const ctx: FilterContext = {
    config,
    verbose,
    limit: usesLimit ? invocation.limit ?? readLimit(classification.args) : undefined,
  };

  const result = compactOutput(classification.filter, raw, ctx);
  if (result.degradedToRaw) {
    logger.debug(`fidelity guard rejected ${classification.filter} output (${result.reason ?? 'unknown'}); emitting raw`);
    if (result.text !== '') output.stdout(result.text);
  } else {
    output.stdout(withNewline(result.text));
  }
  if (raw.stderr !== '') output.stderr(raw.stderr);
  return 0;
}
