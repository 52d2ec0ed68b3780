#!/usr/bin/env node
// engine/cli.ts — CLI entry point for vcs-compact

import { Command, InvalidArgumentError } from 'commander';
import { run } from './index.js';
import type { OutputSink } from './index.js';
import { DEFAULT_CONFIG, finalizeConfig, loadConfig, resolveConfigPath } from './config.js';
import { ConfigError, SpawnError } from './errors.js';
import { createLogger } from './logger.js';
import { nodeRunner } from './harness/process.js';
import type { Backend, CompactConfig } from './types.js';

const VERSION = '0.1.0';

const EXAMPLES = `
Examples:
  vcs-compact jj status
  vcs-compact jj log -r 'trunk()..@'
  vcs-compact -n 10 jj op log
  vcs-compact jj rebase -s xyzxyzxy -d main
  vcs-compact git diff HEAD~1
  vcs-compact --config ./vcs-compact.json jj bookmark list
`;

interface GlobalOptions {
  verbose?: boolean;
  limit?: number;
  config?: string;
}

function parseLimit(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function resolveConfig(configPath: string | undefined): CompactConfig {
  const resolved = configPath ?? resolveConfigPath(process.cwd());
  return resolved ? loadConfig(resolved) : DEFAULT_CONFIG;
}

const stdio: OutputSink = {
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text);
  },
};

async function invoke(backend: Backend, argv: string[], options: GlobalOptions): Promise<void> {
  const logger = createLogger({ verbose: options.verbose });
  try {
    const config = finalizeConfig(resolveConfig(options.config), { limit: options.limit });
    process.exitCode = await run(
      { backend, argv, config, verbose: options.verbose === true, limit: options.limit },
      { runner: nodeRunner, output: stdio, logger },
    );
  } catch (err) {
    if (err instanceof SpawnError || err instanceof ConfigError) {
      logger.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

const program = new Command();

program
  .name('vcs-compact')
  .description('Compact jj and git output for token-constrained readers')
  .version(VERSION)
  .option('-v, --verbose', 'keep full ids and timestamps, log decisions to stderr')
  .option('-n, --limit <n>', 'entries to show for log and op log', parseLimit)
  .option('--config <path>', 'path to a vcs-compact.json config file')
  .enablePositionalOptions()
  .addHelpText('after', EXAMPLES);

for (const backend of ['jj', 'git'] as const) {
  program
    .command(backend)
    .description(`run ${backend} and compact its output`)
    .argument('[args...]', `arguments for ${backend}, passed through verbatim`)
    .helpOption(false)
    .allowUnknownOption()
    .passThroughOptions()
    .action(async (args: string[]) => {
      await invoke(backend, args, program.opts<GlobalOptions>());
    });
}

program.parseAsync(process.argv).catch((err: unknown) => {
  createLogger().error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
