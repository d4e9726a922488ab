/**
 * Effective Values
 *
 * Computes runtime values from merged configuration: reply policy
 * precedence, app credentials, executor limits and task snapshots.
 * Nothing here is cached; callers resolve again whenever they need
 * the current value.
 */

import { ConfigError } from '../models/errors.js';
import type { ReplyPolicy, ReplyPolicySource, Task, TaskAction } from '../models/types.js';
import type { AccountConfig, Config, TaskConfig } from './schema.js';

export const DEFAULT_REPLY_WAIT_SECONDS = 3;
export const DEFAULT_REPLY_HISTORY_LIMIT = 10;
export const DEFAULT_WORKER_COUNT = 4;
export const DEFAULT_QUEUE_SIZE = 100;

/**
 * Resolve the reply policy: task > account > global > default.
 * Each field is resolved independently; only values > 0 count.
 */
export function resolveReplyConfig(
  global: ReplyPolicySource,
  account: ReplyPolicySource,
  task?: ReplyPolicySource
): ReplyPolicy {
  const levels = [task, account, global];
  return {
    wait_seconds: firstPositive(
      levels.map((level) => level?.reply_wait_seconds),
      DEFAULT_REPLY_WAIT_SECONDS
    ),
    history_limit: firstPositive(
      levels.map((level) => level?.reply_history_limit),
      DEFAULT_REPLY_HISTORY_LIMIT
    ),
  };
}

/**
 * Resolve app credentials, account level first
 * @throws ConfigError when either value is missing after resolution
 */
export function resolveAppConfig(
  config: Config,
  account: AccountConfig
): { app_id: number; app_hash: string } {
  const app_id = account.app_id || config.app_id;
  const app_hash = account.app_hash || config.app_hash;
  if (!app_id || !app_hash) {
    throw new ConfigError('missing app_id or app_hash');
  }
  return { app_id, app_hash };
}

/**
 * Worker count and queue capacity, non-positive values replaced by defaults
 */
export function resolveExecutorLimits(
  account: Pick<AccountConfig, 'worker_count' | 'task_queue_size'>
): { worker_count: number; queue_size: number } {
  return {
    worker_count: account.worker_count > 0 ? account.worker_count : DEFAULT_WORKER_COUNT,
    queue_size: account.task_queue_size > 0 ? account.task_queue_size : DEFAULT_QUEUE_SIZE,
  };
}

export function isTaskEnabled(task: Pick<TaskConfig, 'enabled'>): boolean {
  return task.enabled ?? true;
}

/**
 * Build the immutable task snapshot, resolving the method once
 */
export function toTask(config: TaskConfig): Task {
  return Object.freeze({
    name: config.name || config.target,
    target: config.target,
    action: resolveAction(config.method, config.payload),
    payload: config.payload,
    schedule: config.schedule.trim(),
    enabled: isTaskEnabled(config),
    run_on_start: config.run_on_start,
    reply_wait_seconds: config.reply_wait_seconds,
    reply_history_limit: config.reply_history_limit,
  });
}

export function resolveAction(method: string, payload: string): TaskAction {
  switch (method.trim().toLowerCase()) {
    case 'message':
      return { kind: 'message', text: payload };
    case 'button':
      return { kind: 'button', label: payload };
    default:
      return { kind: 'unknown', method };
  }
}

export function resolveSessionName(account: AccountConfig): string {
  return account.phone || `session_${account.app_id}`;
}

export function formatAccountLabel(account: AccountConfig, sessionName: string): string {
  if (account.name && account.phone) {
    return `${account.name}(${account.phone})`;
  }
  return account.name || account.phone || sessionName || 'unknown_account';
}

function firstPositive(values: Array<number | undefined>, fallback: number): number {
  for (const value of values) {
    if (value !== undefined && value > 0) {
      return value;
    }
  }
  return fallback;
}
