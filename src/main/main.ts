#!/usr/bin/env node
/**
 * clipring entry point — builds the services and serves either the
 * interactive console or the JSON line protocol until input ends or a
 * signal arrives.
 */

import { createLogger, setLogLevel } from './services/logger';
import { ConfigService } from './services/config';
import { ServiceContainer } from './services/service-container';
import { ProtocolGateway } from './services/protocol-gateway';
import { ConsoleUI } from './services/console-ui';
import { ClipringError } from '../shared/types';
import { USAGE, parseCliArgs } from './cli-args';

const log = createLogger('Main');

process.on('unhandledRejection', (reason, promise) => {
  log.error('Unhandled promise rejection:', { reason, promise });
});

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const config = new ConfigService({ preset: options.preset });
  if (config.logLevel) setLogLevel(config.logLevel);
  log.info(`Starting in ${options.mode} mode (preset: ${config.preset})`);

  const container = new ServiceContainer(config, { autoStart: options.autoStart });
  await container.init();

  let exitCode = 0;
  const stopAndExit = (code: number): void => {
    exitCode = code;
    container
      .shutdown()
      .catch((err: unknown) => log.error('Shutdown failed:', err))
      .finally(() => process.exit(exitCode));
  };

  process.once('SIGINT', () => stopAndExit(0));
  process.once('SIGTERM', () => stopAndExit(0));
  container.get('poller').once('fatal', () => stopAndExit(1));

  const store = container.get('store');
  if (options.mode === 'gateway') {
    await new ProtocolGateway(store, process.stdin, process.stdout).run();
  } else {
    await new ConsoleUI(store, container.get('poller'), process.stdin, process.stdout).run();
  }

  await container.shutdown();
  return exitCode;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    const error = ClipringError.from(err);
    log.error(`Startup failed [${error.code}]: ${error.message}`);
    process.exit(1);
  });
