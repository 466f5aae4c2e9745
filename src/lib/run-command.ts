import { spawn } from 'node:child_process';

export interface RunCommandOptions {
  cwd?: string;
  /** Merged over `process.env` */
  env?: Record<string, string>;
  /** Kill the command with SIGKILL after this long (0 = no limit) */
  timeoutMS?: number;
  signal?: AbortSignal;
  /** Written to stdin, which is then closed */
  input?: string;
}

export interface RunCommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Runs argv to completion without a shell and collects its output.
 *
 * Resolves for any exit status, including a timeout or an abort; rejects only
 * when the command could not be spawned (e.g. ENOENT).
 */
export function runCommand(
  argv: readonly string[],
  options: RunCommandOptions = {},
): Promise<RunCommandResult> {
  const [command, ...args] = argv;

  if (command === undefined || command === '') {
    return Promise.reject(new Error('runCommand needs at least a command'));
  }

  return new Promise<RunCommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let timeoutHandle: NodeJS.Timeout | undefined;

    const onAbort = (): void => {
      child.kill('SIGKILL');
    };

    const cleanup = (): void => {
      clearTimeout(timeoutHandle);
      options.signal?.removeEventListener('abort', onAbort);
    };

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.once('error', (error) => {
      cleanup();
      reject(error);
    });

    child.once('close', (code, signal) => {
      cleanup();
      resolve({ code, signal, stdout, stderr, timedOut });
    });

    if (options.timeoutMS && options.timeoutMS > 0) {
      timeoutHandle = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, options.timeoutMS);
    }

    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    // A command that exits without reading stdin makes the write fail with EPIPE
    child.stdin.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code !== 'EPIPE') {
        stderr += error.message;
      }
    });
    child.stdin.end(options.input ?? '');
  });
}
