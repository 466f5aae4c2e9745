import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import path from 'node:path';
import YAML from 'yaml';
import type { ZodIssue } from 'zod';
import {
  InvalidProjectNameError,
  InvalidSpecError,
  TopologyFileError,
} from '../orchestrator/errors';
import { ServiceRegistry } from '../orchestrator/service-registry';
import { defineService } from '../orchestrator/service-spec';
import type {
  LaunchSpec,
  ProbeSpec,
  ServiceSpec,
  VolumeMount,
} from '../orchestrator/types';
import { interpolate, type VariableLookup } from './interpolation';
import {
  parseTCPTarget,
  topologySchema,
  type HealthCheckDocument,
  type ServiceDocument,
  type TopologyDocument,
} from './schema';

/** Looked up in this order when no file is named */
export const TOPOLOGY_FILE_NAMES = ['stackctl.yaml', 'stackctl.yml'] as const;

const PROJECT_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

export interface Topology {
  /** Absolute path of the file it was loaded from */
  path: string;
  project: string;
  specs: ServiceSpec[];
  registry: ServiceRegistry;
}

export interface LoadTopologyOptions {
  /** `--project`, wins over everything else */
  project?: string;
  /** Variables for `${NAME}` references and `STACKCTL_PROJECT` (default: process.env) */
  env?: VariableLookup;
}

/**
 * First of `stackctl.yaml` / `stackctl.yml` present in `directory`
 */
export function findTopologyFile(directory: string): string | null {
  for (const name of TOPOLOGY_FILE_NAMES) {
    const candidate = path.join(directory, name);

    if (existsSync(candidate)) {
      return candidate;
    }
  }

  return null;
}

/**
 * Lowercases and replaces everything a container name would reject.
 * `"My Stack"` -> `"my-stack"`, `"..."` -> `"stackctl"`
 */
export function sanitizeProjectName(value: string): string {
  const sanitized = value
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/^[-_]+|-+$/g, '');

  return sanitized === '' ? 'stackctl' : sanitized;
}

/**
 * `--project` > `STACKCTL_PROJECT` > `project:` in the file > the name of the
 * directory holding the file
 */
export function resolveProjectName(sources: {
  flag?: string;
  env?: string;
  file?: string;
  directory: string;
}): string {
  const explicit = [sources.flag, sources.env, sources.file].find(
    (value) => value !== undefined && value.trim() !== '',
  );

  if (explicit === undefined) {
    return sanitizeProjectName(path.basename(sources.directory));
  }

  if (!PROJECT_NAME_PATTERN.test(explicit)) {
    throw new InvalidProjectNameError({ project: explicit });
  }

  return explicit;
}

function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0
    ? `${issue.path.join('.')}: ${issue.message}`
    : issue.message;
}

/**
 * Reads and validates the file without resolving anything
 *
 * @throws TopologyFileError
 */
export async function readTopologyFile(
  filePath: string,
): Promise<TopologyDocument> {
  let text: string;

  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    const notFound =
      error instanceof Error && 'code' in error && error.code === 'ENOENT';

    throw new TopologyFileError(
      notFound ? 'NotFound' : 'Unreadable',
      notFound
        ? `Topology file ${filePath} does not exist`
        : `Topology file ${filePath} could not be read`,
      { path: filePath },
      error,
    );
  }

  const document = YAML.parseDocument(text);

  if (document.errors.length > 0) {
    throw new TopologyFileError(
      'InvalidYAML',
      `Topology file ${filePath} is not valid YAML`,
      { path: filePath, issues: document.errors.map((error) => error.message) },
      document.errors[0],
    );
  }

  const raw: unknown = document.toJS();
  const parsed = topologySchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : '';

    throw new TopologyFileError(
      'InvalidSchema',
      `Topology file ${filePath} is invalid: ${issues[0]}${more}`,
      { path: filePath, issues },
    );
  }

  return parsed.data;
}

function toProbe(check: HealthCheckDocument | undefined): ProbeSpec {
  if (check?.http !== undefined) {
    return { type: 'http', url: check.http };
  }

  if (check?.tcp !== undefined) {
    return { type: 'tcp', ...parseTCPTarget(check.tcp) };
  }

  if (check?.exec !== undefined) {
    return { type: 'exec', command: check.exec };
  }

  return { type: 'none' };
}

function healthTiming(
  check: HealthCheckDocument | undefined,
): Omit<HealthCheckDocument, 'http' | 'tcp' | 'exec'> {
  if (check === undefined) {
    return {};
  }

  const { http, tcp, exec, ...timing } = check;
  return timing;
}

function isBindSource(source: string): boolean {
  return (
    source.startsWith('/') || source.startsWith('.') || source.startsWith('~')
  );
}

/**
 * Named volumes are scoped to the project, bind paths resolved against the
 * file's directory
 */
function resolveVolume(
  volume: VolumeMount,
  project: string,
  baseDir: string,
): VolumeMount {
  if (!isBindSource(volume.source)) {
    return { ...volume, source: `${project}_${volume.source}` };
  }

  const source = volume.source.startsWith('~')
    ? path.join(homedir(), volume.source.slice(1))
    : path.resolve(baseDir, volume.source);

  return { ...volume, source };
}

function toLaunch(
  service: ServiceDocument,
  project: string,
  baseDir: string,
): LaunchSpec {
  if (service.command !== undefined) {
    return {
      kind: 'process',
      command: service.command,
      ...(service.workingDir !== undefined
        ? { workingDir: path.resolve(baseDir, service.workingDir) }
        : {}),
    };
  }

  return {
    kind: 'container',
    image: service.image ?? '',
    args: service.args ?? [],
    volumes: (service.volumes ?? []).map((volume) =>
      resolveVolume(volume, project, baseDir),
    ),
  };
}

/**
 * Interpolates `${NAME}` references. Keys whose value referenced a variable
 * join the declared secret keys.
 */
function resolveEnvironment(
  name: string,
  service: ServiceDocument,
  variables: VariableLookup,
): { environment: Record<string, string>; secretKeys: string[] } {
  const environment: Record<string, string> = {};
  const secretKeys = new Set(service.secretKeys ?? []);

  for (const [key, rawValue] of Object.entries(service.environment ?? {})) {
    const result = interpolate(String(rawValue), variables);

    if (!result.ok) {
      throw new InvalidSpecError({
        serviceName: name,
        reason: `environment ${key} references \${${result.missing}}, which is not set`,
      });
    }

    environment[key] = result.value;

    if (result.interpolated) {
      secretKeys.add(key);
    }
  }

  return { environment, secretKeys: [...secretKeys] };
}

/**
 * Turns a validated document into fully specified ServiceSpecs, applying
 * `defaults` under each service's own settings
 *
 * @throws InvalidSpecError for an unset variable
 */
export function resolveServices(
  document: TopologyDocument,
  options: { project: string; baseDir: string; env: VariableLookup },
): ServiceSpec[] {
  const defaults = document.defaults ?? {};

  return Object.entries(document.services).map(([name, service]) => {
    const { environment, secretKeys } = resolveEnvironment(
      name,
      service,
      options.env,
    );

    return defineService({
      name,
      launch: toLaunch(service, options.project, options.baseDir),
      environment,
      secretKeys,
      ports: service.ports,
      dependsOn: service.dependsOn,
      healthCheck: {
        ...defaults.healthCheck,
        ...healthTiming(service.healthCheck),
        probe: toProbe(service.healthCheck),
      },
      restart: {
        policy: service.restart?.policy ?? defaults.restart?.policy,
        backoff: {
          ...defaults.restart?.backoff,
          ...service.restart?.backoff,
        },
      },
      stopTimeoutMS: service.stopTimeoutMS ?? defaults.stopTimeoutMS,
      stopSignal: service.stopSignal ?? defaults.stopSignal,
      startupTimeoutMS: service.startupTimeoutMS ?? defaults.startupTimeoutMS,
    });
  });
}

/**
 * Reads, validates and resolves a topology file into a registry.
 *
 * ```typescript
 * const topology = await loadTopologyFile('stackctl.yaml', { project: 'demo' });
 * topology.registry.startupOrder(); // ['mongodb', 'fhir-store']
 * ```
 *
 * @throws TopologyFileError, InvalidSpecError, CyclicDependencyError
 */
export async function loadTopologyFile(
  filePath: string,
  options: LoadTopologyOptions = {},
): Promise<Topology> {
  const absolutePath = path.resolve(filePath);
  const baseDir = path.dirname(absolutePath);
  const env = options.env ?? process.env;
  const document = await readTopologyFile(absolutePath);

  const project = resolveProjectName({
    flag: options.project,
    env: env.STACKCTL_PROJECT,
    file: document.project,
    directory: baseDir,
  });

  const specs = resolveServices(document, { project, baseDir, env });

  return {
    path: absolutePath,
    project,
    specs,
    registry: ServiceRegistry.fromSpecs(specs),
  };
}
