import { object } from '@optique/core/constructs';
import type { InferValue } from '@optique/core/parser';
import { constant } from '@optique/core/primitives';
import { openStack, reportError, type CLIContext, type Stack } from '../context';
import { fileOption, projectOption } from '../options';
import { renderStatusTable } from '../status-table';

export const statusCommand = object({
  cmd: constant('status' as const),
  file: fileOption,
  project: projectOption,
});

export type StatusCommandOptions = InferValue<typeof statusCommand>;

export async function handleStatus(
  options: StatusCommandOptions,
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

  // Probe once so a reclaimed service shows its health instead of unknown
  await orchestrator.reclaim();
  await orchestrator.refreshHealth();

  logger.raw(renderStatusTable(orchestrator.status()));

  await orchestrator.release();
  return 0;
}
