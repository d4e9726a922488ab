#!/usr/bin/env node

/**
 * Check-in Runner CLI
 *
 * Runs configured Telegram check-in tasks, either once (--once) or as
 * a daemon that fires scheduled tasks until SIGINT/SIGTERM.
 */

import type { Logger } from 'pino';
import { USAGE, parseCliArgs, type CliOptions } from './cli/args.js';
import { loadConfig, type LoadedConfig } from './config/loader.js';
import { createAppLogger, createConsoleLogger } from './logging/logger.js';
import { createTelegramMessenger } from './messenger/telegram-messenger.js';
import { isCancellation } from './models/errors.js';
import { runTasks, runTasksOnce, type OrchestratorDeps } from './orchestrator/orchestrator.js';

async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    createConsoleLogger().error({ err: error }, 'Invalid arguments');
    return 1;
  }
  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const bootstrap = createConsoleLogger(options.logLevel);

  let loaded: LoadedConfig;
  try {
    loaded = loadConfig(options.configPath);
  } catch (error) {
    bootstrap.error({ err: error, config: options.configPath }, 'Failed to load configuration');
    return 1;
  }
  const { config, sources } = loaded;

  let logger: Logger;
  try {
    ({ logger } = createAppLogger({
      level: options.logLevel || config.log.level,
      dir: config.log.dir,
      format: config.log.format,
    }));
  } catch (error) {
    bootstrap.error({ err: error, log_dir: config.log.dir }, 'Failed to initialize logging');
    return 1;
  }

  logger.info(
    {
      sources,
      accounts: config.accounts.length,
      language: config.language,
      mode: options.once ? 'once' : 'daemon',
    },
    'Configuration loaded'
  );

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutdown signal received');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const deps: OrchestratorDeps = { logger, messengerFactory: createTelegramMessenger };

  if (options.once) {
    try {
      await runTasksOnce(config, deps, controller.signal);
      logger.info('All tasks completed');
      return 0;
    } catch (error) {
      if (isCancellation(error)) {
        logger.info('Run cancelled');
        return 0;
      }
      logger.error({ err: error }, 'Run failed');
      return 1;
    }
  }

  try {
    const handle = runTasks(config, deps, controller.signal);
    logger.info('Daemon running, press Ctrl+C to stop');
    await handle.wait();
  } catch (error) {
    logger.error({ err: error }, 'Daemon failed');
    return 1;
  }
  logger.info('Shutdown complete');
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  }
);
