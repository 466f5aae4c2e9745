import { createConnection } from 'node:net';
import { runCommand } from '../../run-command';
import type { ProbeResult, ProbeSpec } from '../types';

/**
 * What a probe reports; the monitor measures the duration itself
 */
export type ProbeOutcome = Omit<ProbeResult, 'durationMS'>;

/**
 * One health check attempt. Must settle soon after `signal` aborts.
 */
export type ProbeFn = (signal: AbortSignal) => Promise<ProbeOutcome>;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * GET `url`; any 2xx or 3xx answer is healthy. Redirects are not followed.
 */
export async function probeHTTP(
  url: string,
  signal: AbortSignal,
): Promise<ProbeOutcome> {
  try {
    const response = await fetch(url, { redirect: 'manual', signal });
    await response.body?.cancel();

    return {
      ok: response.status >= 200 && response.status < 400,
      message: `HTTP ${response.status}`,
    };
  } catch (error) {
    return { ok: false, message: errorMessage(error) };
  }
}

/**
 * Healthy once a TCP connection to `host:port` is accepted
 */
export function probeTCP(
  host: string,
  port: number,
  signal: AbortSignal,
): Promise<ProbeOutcome> {
  return new Promise<ProbeOutcome>((resolve) => {
    if (signal.aborted) {
      resolve({ ok: false, message: 'aborted' });
      return;
    }

    const socket = createConnection({ host, port });

    const finish = (outcome: ProbeOutcome): void => {
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      resolve(outcome);
    };

    const onAbort = (): void => finish({ ok: false, message: 'aborted' });

    socket.once('connect', () =>
      finish({ ok: true, message: `connected to ${host}:${port}` }),
    );
    socket.once('error', (error) =>
      finish({ ok: false, message: error.message }),
    );
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Healthy when `argv` exits with code 0
 */
export async function probeExec(
  argv: readonly string[],
  signal: AbortSignal,
): Promise<ProbeOutcome> {
  try {
    const result = await runCommand(argv, { signal });

    if (result.code === 0) {
      return { ok: true, message: 'exit code 0' };
    }

    const detail = result.stderr.trim().split('\n')[0] ?? '';
    const status =
      result.signal !== null
        ? `killed by ${result.signal}`
        : `exit code ${result.code ?? 'unknown'}`;

    return { ok: false, message: detail ? `${status}: ${detail}` : status };
  } catch (error) {
    return { ok: false, message: errorMessage(error) };
  }
}

/**
 * Builds the probe for a health check, or null for `none`.
 *
 * @param execArgv - Turns an `exec` command into the argv to run, e.g. wraps
 * it in `docker exec` for containers
 */
export function createProbe(
  probe: ProbeSpec,
  execArgv: (command: string[]) => string[],
): ProbeFn | null {
  switch (probe.type) {
    case 'http':
      return (signal) => probeHTTP(probe.url, signal);
    case 'tcp':
      return (signal) => probeTCP(probe.host, probe.port, signal);
    case 'exec': {
      const argv = execArgv(probe.command);
      return (signal) => probeExec(argv, signal);
    }
    case 'none':
      return null;
  }
}
