/**
 * Sleeps for the specified number of milliseconds.
 *
 * When a signal is given, the sleep ends early as soon as the signal aborts
 * and the returned promise resolves to `false` instead of `true`.
 *
 *  ```typescript
 * await sleep(1000);
 * const completed = await sleep(1000, controller.signal);
 * ```
 */

export async function sleep(
  time: number,
  signal?: AbortSignal,
): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }

  return new Promise<boolean>(function (resolve) {
    const onAbort = (): void => {
      clearTimeout(timeout);
      resolve(false);
    };

    const timeout = setTimeout(function () {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, time);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
