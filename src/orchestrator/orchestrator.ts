/**
 * Session Orchestrator
 *
 * Composes config, messenger, executor and scheduler per account.
 *
 * Run-once: accounts in sequence, every enabled task submitted with
 * blocking submission, per-account failures collected into one
 * AggregateError.
 *
 * Daemon: one concurrent session per account, a single shared
 * scheduler, running until the signal aborts.
 */

import type { Logger } from 'pino';
import {
  formatAccountLabel,
  resolveAppConfig,
  resolveExecutorLimits,
  resolveReplyConfig,
  resolveSessionName,
  toTask,
} from '../config/resolve.js';
import type { AccountConfig, Config, LogFormat, TaskConfig } from '../config/schema.js';
import { isLogFormat } from '../config/schema.js';
import { TaskExecutor } from '../executors/task-executor.js';
import { TaskRunner } from '../executors/task-runner.js';
import type { TaskLoggerFactory } from '../logging/logger.js';
import type { MessengerFactory, MessengerSession } from '../messenger/messenger.js';
import {
  AuthError,
  CancelledError,
  getErrorMessage,
  isCancellation,
} from '../models/errors.js';
import type { Task } from '../models/types.js';
import { Scheduler } from '../scheduler/scheduler.js';

export interface OrchestratorDeps {
  logger: Logger;
  messengerFactory: MessengerFactory;
  taskLoggerFactory?: TaskLoggerFactory;
  scheduler?: Scheduler;     // Daemon only; one is created when absent
}

/**
 * Enabled tasks of one account, by how they get submitted
 */
export interface TaskPlan {
  startup: Task[];
  scheduled: Task[];
  once: Task[];
  disabled: Task[];
}

export interface DaemonHandle {
  scheduler: Scheduler;
  /** Resolves once every account has registered its schedules or given up */
  ready(): Promise<void>;
  /** Resolves once the signal has aborted and every account session has ended */
  wait(): Promise<void>;
}

interface AccountContext {
  account: AccountConfig;
  label: string;
  sessionName: string;
  log: Logger;
  app_id: number;
  app_hash: string;
}

interface StartedAccount {
  scheduled: number;
  done: Promise<void>;
}

export function planAccountTasks(tasks: readonly TaskConfig[], log?: Logger): TaskPlan {
  const plan: TaskPlan = { startup: [], scheduled: [], once: [], disabled: [] };

  for (const config of tasks) {
    const task = toTask(config);
    if (!task.enabled) {
      plan.disabled.push(task);
      log?.info({ task: task.name }, 'Task disabled, skipping');
      continue;
    }
    plan.once.push(task);
    if (task.run_on_start) {
      plan.startup.push(task);
    }
    if (task.schedule !== '') {
      plan.scheduled.push(task);
    }
  }

  return plan;
}

/**
 * Run every enabled task of every account once
 * @throws CancelledError when the signal aborts
 * @throws AggregateError with one entry per failed account
 */
export async function runTasksOnce(config: Config, deps: OrchestratorDeps, signal: AbortSignal): Promise<void> {
  const errors: unknown[] = [];

  for (const [index, account] of config.accounts.entries()) {
    if (signal.aborted) {
      throw new CancelledError('run cancelled');
    }
    try {
      await runAccountOnce(config, account, deps, signal);
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      deps.logger.error({ err: error, account_index: index }, 'Account run failed');
      errors.push(error);
    }
  }

  if (errors.length > 0) {
    throw new AggregateError(errors, `${errors.length} account(s) failed`);
  }
}

/**
 * Start one independent session per account and the shared scheduler.
 * Returns at once; accounts log in and register their schedules in the
 * background, and the scheduler starts with the first registration.
 */
export function runTasks(config: Config, deps: OrchestratorDeps, signal: AbortSignal): DaemonHandle {
  const scheduler = deps.scheduler ?? new Scheduler({ logger: deps.logger });
  const stopScheduler = () => scheduler.stop();
  if (signal.aborted) {
    stopScheduler();
  } else {
    signal.addEventListener('abort', stopScheduler, { once: true });
  }

  const accounts = config.accounts.map((account, index) =>
    startAccount(config, account, index, deps, scheduler, signal)
  );

  const ready = Promise.all(accounts).then((started) => {
    const scheduled = started.reduce((sum, account) => sum + account.scheduled, 0);
    if (signal.aborted) {
      deps.logger.info('Shutdown requested during startup');
    } else if (scheduled === 0) {
      deps.logger.info('No scheduled tasks, scheduler not started');
    }
  });

  return {
    scheduler,
    ready: () => ready,
    wait: async () => {
      await abortion(signal);
      await ready;
      const started = await Promise.all(accounts);
      await Promise.all(started.map((account) => account.done));
      scheduler.stop();
      signal.removeEventListener('abort', stopScheduler);
      deps.logger.info('All account sessions ended');
    },
  };
}

async function runAccountOnce(
  config: Config,
  account: AccountConfig,
  deps: OrchestratorDeps,
  signal: AbortSignal
): Promise<void> {
  const ctx = prepareAccount(config, account, deps.logger);
  const plan = planAccountTasks(account.tasks, ctx.log);
  if (plan.once.length === 0) {
    ctx.log.info('No enabled tasks, skipping');
    return;
  }

  const session = await openSession(config, ctx, deps, signal);
  try {
    const executor = createExecutor(config, ctx, session, deps);
    executor.start(signal);
    try {
      for (const task of plan.once) {
        if (!(await executor.submitTaskBlocking(signal, task, ctx.log, 'once'))) {
          break;
        }
      }
    } finally {
      await executor.stop();
    }
  } finally {
    await closeSession(session, ctx.log);
  }

  if (signal.aborted) {
    throw new CancelledError(`run cancelled for ${ctx.label}`);
  }
  ctx.log.info({ tasks: plan.once.length }, 'Account run completed');
}

/**
 * Set up one daemon account. Failures end that account only.
 */
async function startAccount(
  config: Config,
  account: AccountConfig,
  index: number,
  deps: OrchestratorDeps,
  scheduler: Scheduler,
  signal: AbortSignal
): Promise<StartedAccount> {
  const idle: StartedAccount = { scheduled: 0, done: Promise.resolve() };

  const prepared = tryPrepareAccount(config, account, index, deps.logger);
  if (!prepared) {
    return idle;
  }
  const { ctx, plan } = prepared;

  if (plan.startup.length === 0 && plan.scheduled.length === 0) {
    ctx.log.info('No runnable tasks configured, skipping account');
    return idle;
  }

  let session: MessengerSession;
  try {
    session = await openSession(config, ctx, deps, signal);
  } catch (error) {
    if (isCancellation(error)) {
      ctx.log.info('Login cancelled by shutdown');
    } else {
      ctx.log.error({ err: error }, 'Account session failed');
    }
    return idle;
  }

  const executor = createExecutor(config, ctx, session, deps);
  executor.start(signal);

  for (const task of plan.startup) {
    executor.submitTask(task, ctx.log, 'run_on_start');
  }

  const entryIds: string[] = [];
  for (const task of plan.scheduled) {
    try {
      const id = scheduler.addTask(
        task.schedule,
        () => {
          if (signal.aborted) return;
          executor.submitTask(task, ctx.log, 'scheduled');
        },
        { name: task.name }
      );
      entryIds.push(id);
      ctx.log.info(
        { task: task.name, schedule: task.schedule, next_run: scheduler.getNextRun(id)?.toISOString() },
        'Task scheduled'
      );
    } catch (error) {
      ctx.log.error(
        { err: error, task: task.name, schedule: task.schedule, error: getErrorMessage(error) },
        'Failed to schedule task'
      );
    }
  }

  if (entryIds.length > 0 && !signal.aborted) {
    scheduler.start();
  }

  const done = (async () => {
    await abortion(signal);
    for (const id of entryIds) {
      scheduler.removeTask(id);
    }
    await executor.stop();
    await closeSession(session, ctx.log);
    ctx.log.info('Account session ended');
  })();

  return { scheduled: entryIds.length, done };
}

/**
 * Resolve identity and credentials
 * @throws ConfigError when app_id or app_hash is missing
 */
function prepareAccount(config: Config, account: AccountConfig, logger: Logger): AccountContext {
  const sessionName = resolveSessionName(account);
  const label = formatAccountLabel(account, sessionName);
  const log = logger.child({ account: label, session: sessionName });
  const { app_id, app_hash } = resolveAppConfig(config, account);
  return { account, label, sessionName, log, app_id, app_hash };
}

function tryPrepareAccount(
  config: Config,
  account: AccountConfig,
  index: number,
  logger: Logger
): { ctx: AccountContext; plan: TaskPlan } | undefined {
  try {
    const ctx = prepareAccount(config, account, logger);
    return { ctx, plan: planAccountTasks(account.tasks, ctx.log) };
  } catch (error) {
    logger.error({ err: error, account_index: index }, 'Account configuration failed');
    return undefined;
  }
}

/**
 * Create, connect and authenticate the account session. A login still
 * pending when the signal aborts is abandoned and the session closed.
 * @throws AuthError when connecting or logging in fails
 * @throws CancelledError when the signal aborts first
 */
async function openSession(
  config: Config,
  ctx: AccountContext,
  deps: OrchestratorDeps,
  signal: AbortSignal
): Promise<MessengerSession> {
  const session = deps.messengerFactory({
    app_id: ctx.app_id,
    app_hash: ctx.app_hash,
    session_name: ctx.sessionName,
    proxy: config.proxy,
    logger: ctx.log,
  });

  const login = async () => {
    await session.connect();
    await session.authenticate({ phone: ctx.account.phone, password: ctx.account.password });
  };

  try {
    await Promise.race([login(), rejectOnAbort(signal, `login cancelled for ${ctx.label}`)]);
  } catch (error) {
    await closeSession(session, ctx.log);
    if (isCancellation(error)) {
      throw error;
    }
    throw new AuthError(ctx.label, error);
  }

  ctx.log.info('Account session started');
  return session;
}

function createExecutor(
  config: Config,
  ctx: AccountContext,
  session: MessengerSession,
  deps: OrchestratorDeps
): TaskExecutor {
  const limits = resolveExecutorLimits(ctx.account);
  return new TaskExecutor({
    runner: new TaskRunner(session),
    logger: ctx.log,
    accountName: ctx.label,
    workerCount: limits.worker_count,
    queueSize: limits.queue_size,
    logDir: config.log.dir,
    logFormat: logFormatOf(config),
    taskLoggerFactory: deps.taskLoggerFactory,
    resolvePolicy: (task) => resolveReplyConfig(config, ctx.account, task),
  });
}

async function closeSession(session: MessengerSession, log: Logger): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    log.warn({ err: error }, 'Failed to close session');
  }
}

function logFormatOf(config: Config): LogFormat {
  return isLogFormat(config.log.format) ? config.log.format : 'text';
}

function rejectOnAbort(signal: AbortSignal, message: string): Promise<never> {
  return abortion(signal).then(() => {
    throw new CancelledError(message);
  });
}

function abortion(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}
