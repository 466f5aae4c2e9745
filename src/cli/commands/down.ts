import { object } from '@optique/core/constructs';
import { message } from '@optique/core/message';
import { optional } from '@optique/core/modifiers';
import type { InferValue } from '@optique/core/parser';
import { constant, option } from '@optique/core/primitives';
import { integer } from '@optique/core/valueparser';
import { MAX_TIMER_MS } from '../../lib/orchestrator';
import {
  openStack,
  reportError,
  reportFailures,
  type CLIContext,
  type Stack,
} from '../context';
import { fileOption, projectOption } from '../options';

export const downCommand = object({
  cmd: constant('down' as const),
  file: fileOption,
  project: projectOption,
  timeout: optional(
    option('-t', '--timeout', integer({ metavar: 'MS', min: 0, max: MAX_TIMER_MS }), {
      description: message`Wait this long for each service to exit before SIGKILL (default: its stopTimeoutMS)`,
    }),
  ),
});

export type DownCommandOptions = InferValue<typeof downCommand>;

/**
 * Stops whatever an earlier `up --detach` left running and removes the
 * project's containers and network. Stop failures are reported but never
 * change the exit code; only a topology that cannot be loaded does.
 */
export async function handleDown(
  options: DownCommandOptions,
  context: CLIContext,
): Promise<number> {
  const { logger } = context;
  let stack: Stack;

  try {
    stack = await openStack(options, context);
  } catch (error) {
    reportError(logger, error);
    return 1;
  }

  const { orchestrator } = stack;

  await orchestrator.reclaim();
  const report = await orchestrator.down({ stopTimeoutMS: options.timeout });

  if (report.failures.length > 0) {
    logger.warn('{{count}} service(s) could not be stopped', {
      params: { count: report.failures.length },
    });
    reportFailures(logger, report.failures);
  }

  return 0;
}
