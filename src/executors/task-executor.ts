/**
 * Task Executor
 *
 * Per-account worker pool. Producers (scheduler firings, startup
 * submission, run-once submission) put TaskRequests on one bounded
 * queue; a fixed number of workers take them off and run them.
 */

import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { LogFormat } from '../config/schema.js';
import {
  DEFAULT_QUEUE_SIZE,
  DEFAULT_WORKER_COUNT,
  resolveReplyConfig,
} from '../config/resolve.js';
import { createTaskLogger, type TaskLoggerFactory } from '../logging/logger.js';
import type { MessengerOutcome } from '../messenger/messenger.js';
import { CancelledError, QueueFullWarning, getErrorMessage, isCancellation } from '../models/errors.js';
import type {
  ExecutorState,
  ReplyPolicy,
  ReplyPolicySource,
  Task,
  TaskRequest,
  TriggerType,
} from '../models/types.js';
import { BoundedQueue } from './task-queue.js';
import type { TaskRunner } from './task-runner.js';

export interface TaskExecutorOptions {
  runner: TaskRunner;
  logger: Logger;
  accountName: string;
  workerCount?: number;
  queueSize?: number;
  logDir?: string;
  logFormat?: LogFormat;
  taskLoggerFactory?: TaskLoggerFactory;
  resolvePolicy?: (task: Task) => ReplyPolicy;
}

// Neither global nor account level sets a value, so task values and defaults apply
const UNSET_POLICY: ReplyPolicySource = { reply_wait_seconds: 0, reply_history_limit: 0 };

const START_MESSAGES: Record<TriggerType, string> = {
  run_on_start: 'Executing startup task',
  scheduled: 'Executing scheduled task',
  once: 'Executing task',
};

const FAILURE_MESSAGES: Record<TriggerType, string> = {
  run_on_start: 'Startup task failed',
  scheduled: 'Scheduled task failed',
  once: 'Task failed',
};

export class TaskExecutor {
  readonly workerCount: number;
  readonly queueSize: number;

  private readonly queue: BoundedQueue<TaskRequest>;
  private readonly runner: TaskRunner;
  private readonly log: Logger;
  private readonly accountName: string;
  private readonly logDir: string;
  private readonly logFormat: LogFormat;
  private readonly taskLoggerFactory: TaskLoggerFactory;
  private readonly resolvePolicy: (task: Task) => ReplyPolicy;

  // Aborted by stop(); releases producers blocked on a full queue
  private readonly controller = new AbortController();
  private workers: Promise<void>[] = [];
  private state: ExecutorState = 'created';

  constructor(options: TaskExecutorOptions) {
    this.workerCount = positiveOr(options.workerCount, DEFAULT_WORKER_COUNT);
    this.queueSize = positiveOr(options.queueSize, DEFAULT_QUEUE_SIZE);
    this.queue = new BoundedQueue<TaskRequest>(this.queueSize);
    this.runner = options.runner;
    this.log = options.logger;
    this.accountName = options.accountName;
    this.logDir = options.logDir ?? '';
    this.logFormat = options.logFormat ?? 'text';
    this.taskLoggerFactory = options.taskLoggerFactory ?? createTaskLogger;
    this.resolvePolicy = options.resolvePolicy ?? ((task) => resolveReplyConfig(UNSET_POLICY, UNSET_POLICY, task));
  }

  getState(): ExecutorState {
    return this.state;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  /**
   * Spawn the worker loops
   * @param signal - Process-wide cancellation; workers stop taking work once it aborts
   */
  start(signal: AbortSignal): void {
    if (this.state !== 'created') {
      throw new Error(`Task executor cannot start from state ${this.state}`);
    }
    this.state = 'running';
    this.log.debug({ worker_count: this.workerCount, queue_size: this.queueSize }, 'Starting task executor');

    for (let id = 0; id < this.workerCount; id++) {
      this.workers.push(this.worker(id, signal));
    }
  }

  /**
   * Submit without blocking. A full queue drops the task.
   * @returns false when the task was not queued
   */
  submitTask(task: Task, logger: Logger, trigger: TriggerType): boolean {
    if (this.queue.tryEnqueue(this.createRequest(task, logger, trigger))) {
      return true;
    }
    if (this.queue.isClosed) {
      logger.warn({ task: task.name, trigger }, 'Task executor stopped, dropping task');
      return false;
    }
    const warning = new QueueFullWarning(task.name);
    logger.warn(
      { task: task.name, trigger, code: warning.code, queue_size: this.queueSize },
      'Task queue is full, dropping task'
    );
    return false;
  }

  /**
   * Submit, waiting for queue space
   * @returns false when the signal aborts or the executor stops first
   */
  async submitTaskBlocking(
    signal: AbortSignal,
    task: Task,
    logger: Logger,
    trigger: TriggerType
  ): Promise<boolean> {
    const combined = AbortSignal.any([signal, this.controller.signal]);
    return this.queue.enqueue(this.createRequest(task, logger, trigger), combined);
  }

  /**
   * Stop accepting work and wait for every worker to exit.
   * Requests already queued are still executed unless the start signal
   * has been aborted, in which case they are discarded.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopping' || this.state === 'stopped') {
      return;
    }
    this.state = 'stopping';
    this.controller.abort();
    this.queue.close();

    await Promise.all(this.workers);
    this.workers = [];

    const discarded = this.queue.drain();
    if (discarded.length > 0) {
      this.log.warn({ discarded: discarded.length }, 'Discarded queued tasks on shutdown');
    }

    this.state = 'stopped';
    this.log.debug('Task executor stopped');
  }

  private createRequest(task: Task, logger: Logger, trigger: TriggerType): TaskRequest {
    return {
      id: uuidv4(),
      task,
      trigger,
      logger,
      submitted_at: new Date().toISOString(),
    };
  }

  private async worker(id: number, signal: AbortSignal): Promise<void> {
    const workerLog = this.log.child({ worker_id: id });
    workerLog.debug('Worker started');

    for (;;) {
      let request: TaskRequest | undefined;
      try {
        request = await this.queue.dequeue(signal);
      } catch (error) {
        if (!(error instanceof CancelledError)) {
          workerLog.error({ err: error }, 'Worker failed to take a task');
        }
        break;
      }
      if (request === undefined) {
        break;
      }

      request.worker_id = id;
      await this.executeTask(request, signal);

      if (signal.aborted) {
        break;
      }
    }

    workerLog.debug('Worker exiting');
  }

  /**
   * Run one request, logging to the account log and a task log file.
   * Never throws.
   */
  private async executeTask(request: TaskRequest, signal: AbortSignal): Promise<void> {
    const { task, trigger } = request;
    const taskName = task.name || task.target;
    const fields = {
      thread_id: request.worker_id,
      thread_name: taskName,
      task: taskName,
      request_id: request.id,
    };

    let close = (): void => {};
    let taskLogger = request.logger;
    try {
      const sink = this.taskLoggerFactory({
        dir: this.logDir,
        account: this.accountName,
        task: taskName,
        trigger,
        format: this.logFormat,
      });
      taskLogger = sink.logger;
      close = () => sink.close();
    } catch (error) {
      request.logger.error({ err: error, task: taskName }, 'Failed to create task log file, using main log');
    }

    const taskLog = taskLogger.child({ ...fields, target: task.target });
    const accountLog = request.logger.child(fields);
    const both = (emit: (log: Logger) => void) => {
      emit(taskLog);
      if (taskLogger !== request.logger) {
        emit(accountLog);
      }
    };

    try {
      both((log) => log.info(START_MESSAGES[trigger]));

      const outcome = await this.runner.run(task, {
        policy: this.resolvePolicy(task),
        log: taskLog,
        signal,
      });

      both((log) => logCompletion(log, outcome));
    } catch (error) {
      if (isCancellation(error)) {
        both((log) => log.info({ trigger }, 'Task cancelled'));
        return;
      }
      both((log) =>
        log.error(
          { err: error, error: getErrorMessage(error), payload: task.payload, trigger },
          FAILURE_MESSAGES[trigger]
        )
      );
    } finally {
      close();
    }
  }
}

function logCompletion(log: Logger, outcome: MessengerOutcome): void {
  const fields = { response_type: outcome.responseType, message_id: outcome.messageId };
  if (outcome.reply) {
    log.info({ ...fields, reply: outcome.reply }, 'Task completed');
  } else if (outcome.url) {
    log.info({ ...fields, url: outcome.url }, 'Task completed');
  } else {
    log.info(fields, 'Task completed, no reply');
  }
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isInteger(value) && value > 0 ? value : fallback;
}
