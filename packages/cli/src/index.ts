#!/usr/bin/env node
import { defineCommand, runMain, showUsage } from 'citty';
import type { ArgsDef, CommandDef } from 'citty';
import { consola } from 'consola';
import { EXIT_FAILURE, createButtonGateway, resolveGatewayConfig } from '@ledbridge/gateway';
import type { GatewayConfig, GatewayPhase } from '@ledbridge/gateway';
import { createCliLogging, loadConfigFile, parseCliOptions } from './options.js';

const gatewayArgs = {
  log: {
    type: 'string',
    alias: 'l',
    description: 'Write log output to this file instead of stdout',
    valueHint: 'file',
  },
  verbosity: {
    type: 'string',
    alias: 'v',
    description: 'Log level: 1 fatal, 2 error, 3 warning, 4 info, 5 debug',
    default: '4',
    valueHint: '1-5',
  },
  config: {
    type: 'string',
    alias: 'c',
    description: 'JSON file overriding endpoints, timing and paths',
    valueHint: 'file',
  },
} satisfies ArgsDef;

async function fail(message: string, command: CommandDef<typeof gatewayArgs>): Promise<never> {
  consola.error(message);
  await showUsage(command);
  process.exit(EXIT_FAILURE);
}

async function runGateway(rawArgs: string[], command: CommandDef<typeof gatewayArgs>): Promise<void> {
  const options = parseCliOptions(rawArgs);
  if (!options.ok) {
    return fail(options.error, command);
  }

  let config: GatewayConfig = resolveGatewayConfig();
  if (options.value.configPath) {
    const loaded = await loadConfigFile(options.value.configPath);
    if (!loaded.ok) {
      return fail(loaded.error, command);
    }
    config = loaded.value;
  }

  const { loggerFor } = createCliLogging(options.value);
  const log = loggerFor('cli');

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, stopping`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const gateway = createButtonGateway(config, { loggerFor });
  gateway.on('phaseChanged', (phase: GatewayPhase) => log.debug(`Gateway phase: ${phase}`));
  gateway.on('recovered', (recoveries: number) => log.info(`Server session recovered (${recoveries} so far)`));

  const code = await gateway.run(controller.signal);
  process.exit(code);
}

const main: CommandDef<typeof gatewayArgs> = defineCommand({
  meta: {
    name: 'ledbridge-gateway',
    version: '0.1.0',
    description: 'Mirror a button counter onto an LED across device-management sessions',
  },
  args: gatewayArgs,
  async run({ rawArgs }) {
    await runGateway(rawArgs, main);
  },
});

await runMain(main);
