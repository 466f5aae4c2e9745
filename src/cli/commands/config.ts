import { object } from '@optique/core/constructs';
import type { InferValue } from '@optique/core/parser';
import { constant } from '@optique/core/primitives';
import { MultiColumnASCIITable } from '../../lib/ascii-tables';
import type { ServiceSpec } from '../../lib/orchestrator';
import { loadTopologyFile } from '../../lib/topology';
import { reportError, resolveTopologyPath, type CLIContext } from '../context';
import { fileOption, projectOption } from '../options';

export const configCommand = object({
  cmd: constant('config' as const),
  file: fileOption,
  project: projectOption,
});

export type ConfigCommandOptions = InferValue<typeof configCommand>;

function describeLaunch(spec: ServiceSpec): string {
  return spec.launch.kind === 'container'
    ? `image ${spec.launch.image}`
    : spec.launch.command.join(' ');
}

/**
 * Validates the topology file and prints the order services start in.
 * Environment values are left out, they may hold secrets.
 */
export async function handleConfig(
  options: ConfigCommandOptions,
  context: CLIContext,
): Promise<number> {
  const { logger } = context;

  try {
    const topology = await loadTopologyFile(
      resolveTopologyPath(options.file, context),
      { project: options.project, env: context.env },
    );

    const table = new MultiColumnASCIITable(['#', 'SERVICE', 'RUNS', 'DEPENDS ON']);

    topology.registry.startupOrder().forEach((name, index) => {
      const spec = topology.registry.require(name);

      table.addRow([
        String(index + 1),
        name,
        describeLaunch(spec),
        spec.dependsOn.length > 0 ? spec.dependsOn.join(', ') : '-',
      ]);
    });

    logger.success('{{path}} is valid, project {{project}}', {
      params: { path: topology.path, project: topology.project },
    });
    logger.raw(table.toString());

    return 0;
  } catch (error) {
    reportError(logger, error);
    return 1;
  }
}
