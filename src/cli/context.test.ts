import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { LogLevel, Logger } from '../lib/logger';
import { FakeLauncher } from '../lib/orchestrator/testing/fake-launcher';
import {
  createCLILogger,
  openStack,
  resolveLogLevel,
  resolveTopologyPath,
} from './context';

describe('resolveLogLevel', () => {
  test('defaults to info', () => {
    expect(resolveLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(resolveLogLevel(' ')).toBe(LogLevel.INFO);
  });

  test('accepts level names in any case', () => {
    expect(resolveLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(resolveLogLevel('WARN')).toBe(LogLevel.WARN);
  });

  test('returns null for an unknown name', () => {
    expect(resolveLogLevel('loud')).toBeNull();
  });
});

describe('createCLILogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('warns about an unknown STACKCTL_LOG_LEVEL', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createCLILogger({ STACKCTL_LOG_LEVEL: 'loud', NO_COLOR: '1' });

    expect(warn).toHaveBeenCalledWith(
      'Ignoring STACKCTL_LOG_LEVEL=loud, expected one of error, warn, notice, info, debug',
    );
  });
});

describe('topology files', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'stackctl-context-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  test('prefers -f, then STACKCTL_FILE, then the working directory', async () => {
    const cwd = directory;

    expect(resolveTopologyPath('infra/stack.yaml', { cwd, env: { STACKCTL_FILE: 'other.yaml' } })).toBe(
      path.join(directory, 'infra', 'stack.yaml'),
    );
    expect(resolveTopologyPath(undefined, { cwd, env: { STACKCTL_FILE: 'other.yaml' } })).toBe(
      path.join(directory, 'other.yaml'),
    );
    expect(resolveTopologyPath(undefined, { cwd, env: {} })).toBe(
      path.join(directory, 'stackctl.yaml'),
    );

    await writeFile(path.join(directory, 'stackctl.yml'), 'services: {}', 'utf8');

    expect(resolveTopologyPath(undefined, { cwd, env: {} })).toBe(
      path.join(directory, 'stackctl.yml'),
    );
  });

  test('openStack builds an orchestrator for the project', async () => {
    await writeFile(
      path.join(directory, 'stackctl.yaml'),
      'services:\n  db:\n    image: mongo:7\n',
      'utf8',
    );
    const launcher = new FakeLauncher();
    const { logger } = Logger.createTestOptimizedLogger();

    const { topology, orchestrator } = await openStack(
      { project: 'staging' },
      { env: {}, cwd: directory, logger, createLauncher: () => launcher },
    );

    expect(topology.project).toBe('staging');
    expect(orchestrator.project).toBe('staging');
    expect(orchestrator.status().services.map((service) => service.state)).toEqual([
      'pending',
    ]);
  });
});
