/**
 * Config Merge
 *
 * Sparse-override merge of configuration layers. A scalar in the
 * override wins only when it is non-empty / non-zero, so an overlay
 * file only needs the fields it changes.
 */

import { ConfigError } from '../models/errors.js';
import type { AccountConfig, Config, LogConfig, TaskConfig } from './schema.js';

export function mergeConfig(base: Config | undefined, override: Config | undefined): Config {
  if (!base) {
    if (!override) {
      throw new ConfigError('no configuration to merge');
    }
    return override;
  }
  if (!override) {
    return base;
  }

  return {
    accounts: override.accounts.length > 0
      ? mergeAccounts(base.accounts, override.accounts)
      : base.accounts,
    proxy: pick(base.proxy, override.proxy),
    app_id: pick(base.app_id, override.app_id),
    app_hash: pick(base.app_hash, override.app_hash),
    reply_wait_seconds: pick(base.reply_wait_seconds, override.reply_wait_seconds),
    reply_history_limit: pick(base.reply_history_limit, override.reply_history_limit),
    log: mergeLog(base.log, override.log),
    language: pick(base.language, override.language),
  };
}

/**
 * Merge account lists
 *
 * By name when every account on both sides is named, otherwise by
 * position. A positional merge of lists with different lengths has no
 * safe interpretation and is rejected.
 */
export function mergeAccounts(base: AccountConfig[], override: AccountConfig[]): AccountConfig[] {
  if (override.length === 0) {
    return base;
  }
  if (allAccountsNamed(base) && allAccountsNamed(override)) {
    return mergeAccountsByName(base, override);
  }
  if (base.length !== override.length) {
    throw new ConfigError(
      `accounts length mismatch: base=${base.length} override=${override.length}`
    );
  }
  return mergeByIndex(base, override, mergeAccount);
}

export function mergeAccount(base: AccountConfig, override: AccountConfig): AccountConfig {
  return {
    name: pick(base.name, override.name),
    phone: pick(base.phone, override.phone),
    password: pick(base.password, override.password),
    app_id: pick(base.app_id, override.app_id),
    app_hash: pick(base.app_hash, override.app_hash),
    worker_count: pick(base.worker_count, override.worker_count),
    task_queue_size: pick(base.task_queue_size, override.task_queue_size),
    reply_wait_seconds: pick(base.reply_wait_seconds, override.reply_wait_seconds),
    reply_history_limit: pick(base.reply_history_limit, override.reply_history_limit),
    tasks: override.tasks.length > 0 ? mergeTasks(base.tasks, override.tasks) : base.tasks,
  };
}

/**
 * Tasks have no required unique name, so they always merge by position.
 * The longer side supplies the tail unchanged.
 */
export function mergeTasks(base: TaskConfig[], override: TaskConfig[]): TaskConfig[] {
  return mergeByIndex(base, override, mergeTask);
}

export function mergeTask(base: TaskConfig, override: TaskConfig): TaskConfig {
  return {
    name: pick(base.name, override.name),
    target: pick(base.target, override.target),
    method: pick(base.method, override.method),
    payload: pick(base.payload, override.payload),
    schedule: pick(base.schedule, override.schedule),
    enabled: override.enabled ?? base.enabled,
    run_on_start: override.run_on_start || base.run_on_start,
    reply_wait_seconds: pick(base.reply_wait_seconds, override.reply_wait_seconds),
    reply_history_limit: pick(base.reply_history_limit, override.reply_history_limit),
  };
}

function mergeLog(base: LogConfig, override: LogConfig): LogConfig {
  return {
    dir: pick(base.dir, override.dir),
    level: pick(base.level, override.level),
    format: pick(base.format, override.format),
  };
}

function allAccountsNamed(accounts: AccountConfig[]): boolean {
  return accounts.length > 0 && accounts.every((acc) => acc.name.trim() !== '');
}

function mergeAccountsByName(base: AccountConfig[], override: AccountConfig[]): AccountConfig[] {
  const overrideIndex = new Map<string, AccountConfig>();
  for (const acc of override) {
    overrideIndex.set(acc.name.trim(), acc);
  }

  const seen = new Set<string>();
  const merged = base.map((acc) => {
    const key = acc.name.trim();
    const over = overrideIndex.get(key);
    if (!over) {
      return acc;
    }
    seen.add(key);
    return mergeAccount(acc, over);
  });

  for (const acc of override) {
    if (!seen.has(acc.name.trim())) {
      merged.push(acc);
    }
  }
  return merged;
}

function mergeByIndex<T>(base: T[], override: T[], merge: (b: T, o: T) => T): T[] {
  const length = Math.max(base.length, override.length);
  const merged: T[] = [];
  for (let i = 0; i < length; i++) {
    const b = base[i];
    const o = override[i];
    if (b !== undefined && o !== undefined) {
      merged.push(merge(b, o));
    } else if (b !== undefined) {
      merged.push(b);
    } else if (o !== undefined) {
      merged.push(o);
    }
  }
  return merged;
}

function pick<T extends string | number>(base: T, override: T): T {
  return override === '' || override === 0 ? base : override;
}
