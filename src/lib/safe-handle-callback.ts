import { isPromise } from './is-promise';

/**
 * Receives errors thrown (or rejected) by a guarded callback
 */
export type CallbackErrorReporter = (error: Error, callbackName: string) => void;

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Fallback reporter when the caller did not provide one.
 *
 * Node has no global `reportError` event target, so the error is surfaced as a
 * process warning rather than silently dropped.
 */
export const defaultCallbackErrorReporter: CallbackErrorReporter = (
  error,
  callbackName,
) => {
  process.emitWarning(
    `Error in a callback ${callbackName}: ${error.message}`,
    'CallbackError',
  );
};

/**
 * Safely runs a callback by catching any errors and handing them to a reporter.
 * Works with both synchronous and Promise-returning callbacks.
 *
 * This is "fire-and-forget": it does not wait for an async callback to settle.
 * Event listeners of the orchestrator run through this, so a throwing listener
 * can never break the startup or teardown flow that emitted the event.
 *
 * @param callbackName - Name used in error reports
 * @param callback - The function to run
 * @param args - Arguments passed to the callback
 * @param reporter - Where errors go (default: process warning)
 */
export function safeHandleCallback<TArgs extends unknown[]>(
  callbackName: string,
  callback: (...args: TArgs) => unknown,
  args: TArgs,
  reporter: CallbackErrorReporter = defaultCallbackErrorReporter,
): void {
  const report = (error: unknown): void => {
    try {
      reporter(toError(error), callbackName);
    } catch {
      // A failing reporter has nowhere left to report to
      defaultCallbackErrorReporter(toError(error), callbackName);
    }
  };

  try {
    const result = callback(...args);

    if (isPromise(result)) {
      result.catch(report);
    }
  } catch (error) {
    report(error);
  }
}
