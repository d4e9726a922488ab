/**
 * Logging
 *
 * pino loggers for the process, each account and each task execution.
 * The app log goes to stdout and <dir>/app.log; every task execution
 * also gets its own file under <dir>/tasks.
 */

import * as fs from 'fs';
import * as path from 'path';
import pino, { type DestinationStream, type Logger } from 'pino';
import { build as prettyStream } from 'pino-pretty';
import {
  DEFAULT_LOG_DIR,
  DEFAULT_LOG_FORMAT,
  DEFAULT_LOG_LEVEL,
  isLogFormat,
  isLogLevel,
  type LogFormat,
  type LogLevel,
} from '../config/schema.js';
import type { TriggerType } from '../models/types.js';

const TIME_FORMAT = 'SYS:yyyy/mm/dd HH:MM:ss';

export interface AppLogger {
  logger: Logger;
  appLogPath: string;
}

export interface TaskLogOptions {
  dir: string;
  account: string;
  task: string;
  trigger: TriggerType;
  format: LogFormat;
  now?: Date;
}

/**
 * A task log destination. close() must be called once the execution ends.
 */
export interface TaskLogSink {
  logger: Logger;
  file: string;
  close(): void;
}

export type TaskLoggerFactory = (options: TaskLogOptions) => TaskLogSink;

/**
 * Normalize a level string; invalid values fall back to info
 */
export function resolveLogLevel(value: string | undefined): { level: LogLevel; invalid?: string } {
  const trimmed = value?.trim().toLowerCase() ?? '';
  if (trimmed === '') {
    return { level: DEFAULT_LOG_LEVEL };
  }
  if (isLogLevel(trimmed)) {
    return { level: trimmed };
  }
  return { level: DEFAULT_LOG_LEVEL, invalid: value };
}

export function resolveLogFormat(value: string | undefined): LogFormat {
  const trimmed = value?.trim().toLowerCase() ?? '';
  return isLogFormat(trimmed) ? trimmed : DEFAULT_LOG_FORMAT;
}

/**
 * Console-only logger used until configuration is loaded
 */
export function createConsoleLogger(levelValue?: string): Logger {
  const { level, invalid } = resolveLogLevel(levelValue);
  const logger = pino({ level, base: null }, consoleStream(DEFAULT_LOG_FORMAT));
  if (invalid !== undefined) {
    logger.warn({ invalid_level: invalid, fallback: level }, 'Invalid log level');
  }
  if (level === 'debug') {
    logger.debug('Debug mode enabled');
  }
  return logger;
}

/**
 * Console + <dir>/app.log logger
 * @throws when the log directory or app.log cannot be created
 */
export function createAppLogger(options: {
  level?: string;
  dir?: string;
  format?: string;
}): AppLogger {
  const dir = options.dir || DEFAULT_LOG_DIR;
  const format = resolveLogFormat(options.format);
  const { level, invalid } = resolveLogLevel(options.level);

  fs.mkdirSync(dir, { recursive: true });
  const appLogPath = path.join(dir, 'app.log');
  const fd = fs.openSync(appLogPath, 'a');

  const streams = pino.multistream([
    { level, stream: consoleStream(format) },
    { level, stream: fileStream(fd, format) },
  ]);
  const logger = pino(
    { level, base: null, timestamp: pino.stdTimeFunctions.isoTime },
    streams
  );

  if (invalid !== undefined) {
    logger.warn({ invalid_level: invalid, fallback: level }, 'Invalid log level');
  }
  if (level === 'debug') {
    logger.debug('Debug mode enabled');
  }
  logger.info({ log_dir: dir, app_log: appLogPath, format, log_level: level }, 'Logging system initialized');

  return { logger, appLogPath };
}

/**
 * Open a dedicated log file for one task execution
 * @throws when the task log directory or file cannot be created
 */
export function createTaskLogger(options: TaskLogOptions): TaskLogSink {
  const taskDir = path.join(options.dir || DEFAULT_LOG_DIR, 'tasks');
  fs.mkdirSync(taskDir, { recursive: true });

  const file = path.join(taskDir, taskLogFileName(options));
  const fd = fs.openSync(file, 'a');
  const destination = fileStream(fd, options.format);

  const logger = pino(
    { level: 'debug', base: null, timestamp: pino.stdTimeFunctions.isoTime },
    destination
  ).child({ account: options.account, task: options.task, trigger: options.trigger });

  let closed = false;
  return {
    logger,
    file,
    close: () => {
      if (closed) return;
      closed = true;
      if (destination.end) {
        destination.end();
      } else {
        fs.closeSync(fd);
      }
    },
  };
}

/**
 * account_task_trigger_YYYYMMDD_HHmmss.log
 */
export function taskLogFileName(options: Pick<TaskLogOptions, 'account' | 'task' | 'trigger' | 'now'>): string {
  const now = options.now ?? new Date();
  const pad = (n: number) => String(n).padStart(2, '0');
  const timestamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${sanitizeFilename(options.account)}_${sanitizeFilename(options.task)}_${options.trigger}_${timestamp}.log`;
}

/**
 * Replace characters that are not safe in file names
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[\/\\:*?"<>| ]/g, '_').replace(/[@+]/g, '');
}

function consoleStream(format: LogFormat): DestinationStream {
  if (format === 'json') {
    return pino.destination({ dest: 1, sync: true });
  }
  return prettyStream({
    destination: 1,
    sync: true,
    translateTime: TIME_FORMAT,
    ignore: 'pid,hostname',
  });
}

function fileStream(fd: number, format: LogFormat): DestinationStream & { end?: () => void } {
  if (format === 'json') {
    return pino.destination({ dest: fd, sync: true });
  }
  return prettyStream({
    destination: fd,
    sync: true,
    colorize: false,
    translateTime: TIME_FORMAT,
    ignore: 'pid,hostname',
  });
}
