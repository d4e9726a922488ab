/**
 * Command Line Arguments
 *
 * Usage: checkin-runner [--once] [--log-level <level>] [--config <path>]
 */

import { parseArgs } from 'node:util';
import { ConfigError, getErrorMessage } from '../models/errors.js';

export const DEFAULT_CONFIG_PATH = 'config.yaml';

export const USAGE = 'Usage: checkin-runner [--once] [--log-level debug|info|warn|error] [--config <path>]';

export interface CliOptions {
  once: boolean;
  logLevel?: string;
  configPath: string;
  help: boolean;
}

/**
 * @throws ConfigError for unknown flags or missing values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        once: { type: 'boolean', default: false },
        'log-level': { type: 'string' },
        config: { type: 'string', default: DEFAULT_CONFIG_PATH },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    });
    return {
      once: values.once ?? false,
      logLevel: values['log-level'],
      configPath: values.config || DEFAULT_CONFIG_PATH,
      help: values.help ?? false,
    };
  } catch (error) {
    throw new ConfigError(`${getErrorMessage(error)}\n${USAGE}`, { cause: error });
  }
}
