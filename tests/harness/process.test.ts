import { describe, it, expect } from 'vitest';
import { nodeRunner } from '../../engine/harness/process.js';
import { SpawnError } from '../../engine/errors.js';

const NODE = process.execPath;
const MISSING = 'vcs-compact-test-missing-binary';
const SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

function listenerCounts(): number[] {
  return SIGNALS.map(signal => process.listenerCount(signal));
}

describe('nodeRunner.capture', () => {
  it('collects stdout, stderr and the exit code', async () => {
    const raw = await nodeRunner.capture(NODE, [
      '-e',
      'process.stdout.write("out\\n"); process.stderr.write("err\\n"); process.exitCode = 3;',
    ]);
    expect(raw).toEqual({ stdout: 'out\n', stderr: 'err\n', exitStatus: 3 });
  });

  it('collects output spanning many chunks', async () => {
    const raw = await nodeRunner.capture(NODE, ['-e', 'process.stdout.write("x".repeat(200000))']);
    expect(raw.stdout).toHaveLength(200000);
    expect(raw.exitStatus).toBe(0);
  });

  it('reports no exit status for a child killed by a signal', async () => {
    const raw = await nodeRunner.capture(NODE, ['-e', 'process.kill(process.pid, "SIGKILL")']);
    expect(raw.exitStatus).toBeNull();
  });

  it('rejects with SpawnError when the binary is missing', async () => {
    const before = listenerCounts();
    const result = nodeRunner.capture(MISSING, []);
    await expect(result).rejects.toBeInstanceOf(SpawnError);
    await expect(result).rejects.toMatchObject({ binary: MISSING, code: 'ENOENT' });
    expect(listenerCounts()).toEqual(before);
  });

  it('relays termination signals only while the child runs', async () => {
    const before = listenerCounts();
    const pending = nodeRunner.capture(NODE, ['-e', '']);
    expect(listenerCounts()).toEqual(before.map(n => n + 1));
    await pending;
    expect(listenerCounts()).toEqual(before);
  });
});

describe('nodeRunner.passthrough', () => {
  it('resolves to the child exit code', async () => {
    expect(await nodeRunner.passthrough(NODE, ['-e', 'process.exit(5)'])).toBe(5);
    expect(await nodeRunner.passthrough(NODE, ['-e', ''])).toBe(0);
  });

  it('resolves to 1 when the child is killed by a signal', async () => {
    expect(await nodeRunner.passthrough(NODE, ['-e', 'process.kill(process.pid, "SIGKILL")'])).toBe(1);
  });

  it('rejects with SpawnError when the binary is missing', async () => {
    await expect(nodeRunner.passthrough(MISSING, [])).rejects.toBeInstanceOf(SpawnError);
  });

  it('removes its signal handlers after the child closes', async () => {
    const before = listenerCounts();
    const pending = nodeRunner.passthrough(NODE, ['-e', '']);
    expect(listenerCounts()).toEqual(before.map(n => n + 1));
    await pending;
    expect(listenerCounts()).toEqual(before);
  });
});
