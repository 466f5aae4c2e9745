import { object } from '@optique/core/constructs';
import { message } from '@optique/core/message';
import { multiple } from '@optique/core/modifiers';
import type { InferValue } from '@optique/core/parser';
import { argument, constant, option } from '@optique/core/primitives';
import { string } from '@optique/core/valueparser';
import {
  openStack,
  reportError,
  reportFailures,
  type CLIContext,
  type Stack,
} from '../context';
import { fileOption, projectOption } from '../options';
import { renderStatusTable } from '../status-table';

export const upCommand = object({
  cmd: constant('up' as const),
  file: fileOption,
  project: projectOption,
  detach: option('-d', '--detach', {
    description: message`Return once the stack is healthy and leave it running`,
  }),
  services: multiple(
    argument(string({ metavar: 'SERVICE' }), {
      description: message`Only these services and what they depend on`,
    }),
  ),
});

export type UpCommandOptions = InferValue<typeof upCommand>;

/**
 * Brings the stack up. In the foreground it then supervises until
 * SIGINT/SIGTERM and tears down; with `--detach` it leaves the containers
 * running.
 *
 * @returns the exit code
 */
export async function handleUp(
  options: UpCommandOptions,
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

  const { topology, orchestrator } = stack;

  if (options.detach) {
    const processes = topology.specs
      .filter((spec) => spec.launch.kind === 'process')
      .map((spec) => spec.name);

    if (processes.length > 0) {
      logger.error(
        '--detach only works for image services, {{services}} run as local processes',
        { params: { services: processes.join(', ') } },
      );
      return 1;
    }
  }

  orchestrator.attachSignals({
    source: context.signalSource,
    onForcedShutdown: context.onForcedShutdown,
    onInfoRequested: () => {
      logger.raw(renderStatusTable(orchestrator.status()));
    },
  });

  const report = await orchestrator.up({
    services: options.services.length > 0 ? [...options.services] : undefined,
  });

  if (!report.success) {
    if (!report.cancelled) {
      reportFailures(logger, report.failures);
    }

    await orchestrator.down();
    orchestrator.detachSignals();
    return 1;
  }

  logger.raw(renderStatusTable(orchestrator.status()));

  if (options.detach) {
    await orchestrator.release();
    logger.success('Stack {{project}} is running, stop it with "stackctl down"', {
      params: { project: topology.project },
    });
    return 0;
  }

  logger.notice('Press Ctrl+C to stop');

  const shutdown = await orchestrator.waitForShutdown();
  orchestrator.detachSignals();

  reportFailures(logger, shutdown.failures);
  return shutdown.success ? 0 : 1;
}
