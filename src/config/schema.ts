/**
 * Configuration Schema
 *
 * Shape of config.yaml. Every scalar defaults to its empty value so
 * overlays can be merged sparsely: an empty or zero field means
 * "not set here". `enabled` stays optional because absent means enabled.
 */

import { z } from 'zod';

export const LOG_FORMATS = ['text', 'json'] as const;
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];

// YAML turns `key:` with no value into null
const blank = (value: unknown): unknown => (value === null ? undefined : value);

const int = z.preprocess(blank, z.coerce.number().int().default(0));
const str = z.preprocess(blank, z.coerce.string().default(''));
const flag = z.preprocess(blank, z.boolean().optional());

export const TaskConfigSchema = z.object({
  name: str,
  target: str,
  method: str,
  payload: str,
  schedule: str,
  enabled: flag,
  run_on_start: z.preprocess(blank, z.boolean().default(false)),
  reply_wait_seconds: int,
  reply_history_limit: int,
});

export const AccountConfigSchema = z.object({
  name: str,
  phone: str,
  password: str,
  app_id: int,
  app_hash: str,
  worker_count: int,
  task_queue_size: int,
  reply_wait_seconds: int,
  reply_history_limit: int,
  tasks: z.preprocess(blank, z.array(TaskConfigSchema).default([])),
});

export const LogConfigSchema = z.object({
  dir: str,
  level: str,
  format: str,
});

export const ConfigSchema = z.object({
  accounts: z.preprocess(blank, z.array(AccountConfigSchema).default([])),
  proxy: str,
  app_id: int,
  app_hash: str,
  reply_wait_seconds: int,
  reply_history_limit: int,
  log: z.preprocess(blank, LogConfigSchema.default({})),
  language: str,
});

export type TaskConfig = z.infer<typeof TaskConfigSchema>;
export type AccountConfig = z.infer<typeof AccountConfigSchema>;
export type LogConfig = z.infer<typeof LogConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_LOG_DIR = './log';
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
export const DEFAULT_LOG_FORMAT: LogFormat = 'text';
export const DEFAULT_LANGUAGE = 'en';

export function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Fill the logging and language defaults on an already merged config
 */
export function withDefaults(config: Config): Config {
  return {
    ...config,
    log: {
      dir: config.log.dir || DEFAULT_LOG_DIR,
      level: config.log.level || DEFAULT_LOG_LEVEL,
      format: config.log.format || DEFAULT_LOG_FORMAT,
    },
    language: config.language || DEFAULT_LANGUAGE,
  };
}
