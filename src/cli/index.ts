#!/usr/bin/env node
import { or } from '@optique/core/constructs';
import { message } from '@optique/core/message';
import { command } from '@optique/core/primitives';
import { run } from '@optique/run';
import { configCommand, handleConfig } from './commands/config';
import { downCommand, handleDown } from './commands/down';
import { handleStatus, statusCommand } from './commands/status';
import { handleUp, upCommand } from './commands/up';
import { createCLILogger, type CLIContext } from './context';

export const VERSION = '0.1.0';

const parser = or(
  command('up', upCommand, {
    description: message`Start the stack in dependency order and supervise it`,
  }),
  command('down', downCommand, {
    description: message`Stop every service of the stack and remove its containers`,
  }),
  command('status', statusCommand, {
    description: message`Show state, health, pid, restarts and uptime per service`,
  }),
  command('config', configCommand, {
    description: message`Validate the topology file and print the startup order`,
  }),
);

const result = run(parser, {
  programName: 'stackctl',
  version: VERSION,
  description: message`Starts a multi-service stack in dependency order, gated on health`,
  help: 'both',
});

const logger = createCLILogger(process.env);

const context: CLIContext = {
  env: process.env,
  cwd: process.cwd(),
  logger,
  onForcedShutdown: (signal) => {
    logger.error('Received {{signal}} again, exiting without waiting for services', {
      params: { signal },
    });
    process.exit(130);
  },
};

async function main(): Promise<number> {
  switch (result.cmd) {
    case 'up':
      return handleUp(result, context);
    case 'down':
      return handleDown(result, context);
    case 'status':
      return handleStatus(result, context);
    case 'config':
      return handleConfig(result, context);
  }
}

void main()
  .catch((error: unknown) => {
    logger.errorObject('stackctl failed', error);
    return 1;
  })
  .then(async (exitCode) => {
    process.exitCode = exitCode;
    await logger.close();
  });
