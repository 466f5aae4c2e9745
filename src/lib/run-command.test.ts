import { describe, expect, it } from 'vitest';
import { runCommand } from './run-command';

const node = process.execPath;

describe('runCommand', () => {
  it('collects stdout, stderr and the exit code', async () => {
    const result = await runCommand([
      node,
      '-e',
      'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)',
    ]);

    expect(result).toEqual({
      code: 3,
      signal: null,
      stdout: 'out',
      stderr: 'err',
      timedOut: false,
    });
  });

  it('passes environment variables through', async () => {
    const result = await runCommand(
      [node, '-e', 'process.stdout.write(process.env.STACKCTL_TEST_VALUE)'],
      { env: { STACKCTL_TEST_VALUE: 'test-secret' } },
    );

    expect(result.stdout).toBe('test-secret');
  });

  it('writes input to stdin', async () => {
    const result = await runCommand(
      [node, '-e', 'process.stdin.pipe(process.stdout)'],
      { input: 'hello' },
    );

    expect(result.stdout).toBe('hello');
  });

  it('kills the command after the timeout', async () => {
    const result = await runCommand([node, '-e', 'setTimeout(() => {}, 10000)'], {
      timeoutMS: 100,
    });

    expect(result.timedOut).toBe(true);
    expect(result.signal).toBe('SIGKILL');
    expect(result.code).toBeNull();
  });

  it('rejects when the command cannot be spawned', async () => {
    await expect(
      runCommand(['stackctl-command-that-does-not-exist']),
    ).rejects.toThrow('ENOENT');
  });

  it('rejects an empty argv', async () => {
    await expect(runCommand([])).rejects.toThrow(
      'runCommand needs at least a command',
    );
  });
});
