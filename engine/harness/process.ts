// engine/harness/process.ts — Spawning the VCS: captured or with inherited stdio

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { SpawnError } from '../errors.js';
import type { RawOutput } from '../types.js';

/**
 * Seam between the harness and the operating system. Tests substitute an
 * in-memory implementation.
 */
export interface CommandRunner {
  /** Run to completion with stdout and stderr collected. */
  capture(binary: string, args: readonly string[]): Promise<RawOutput>;
  /** Run with the terminal attached; resolves to the exit code. */
  passthrough(binary: string, args: readonly string[]): Promise<number>;
}

const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Relay termination signals to the child while it runs. Returns the
 * function that removes the handlers again.
 */
function forwardSignals(child: ChildProcess): () => void {
  const handlers = FORWARDED_SIGNALS.map(signal => {
    const handler = (): void => {
      child.kill(signal);
    };
    process.on(signal, handler);
    return { signal, handler };
  });
  return () => {
    for (const { signal, handler } of handlers) process.off(signal, handler);
  };
}

function toErrno(err: Error): NodeJS.ErrnoException {
  return err;
}

export const nodeRunner: CommandRunner = {
  capture(binary, args) {
    return new Promise((resolve, reject) => {
      const child = spawn(binary, [...args], { stdio: ['inherit', 'pipe', 'pipe'] });
      const release = forwardSignals(child);
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', err => {
        release();
        reject(new SpawnError(binary, toErrno(err)));
      });
      child.on('close', code => {
        release();
        resolve({
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
          exitStatus: code,
        });
      });
    });
  },

  passthrough(binary, args) {
    return new Promise((resolve, reject) => {
      const child = spawn(binary, [...args], { stdio: 'inherit' });
      const release = forwardSignals(child);

      child.on('error', err => {
        release();
        reject(new SpawnError(binary, toErrno(err)));
      });
      child.on('close', code => {
        release();
        resolve(code ?? 1);
      });
    });
  },
};
