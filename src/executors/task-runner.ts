/**
 * Task Runner
 *
 * Dispatches one task to the matching Messenger operation. A single
 * attempt per call; no retries.
 */

import type { Logger } from 'pino';
import type { Messenger, MessengerOutcome } from '../messenger/messenger.js';
import { TaskExecutionError, UnknownMethodError, isCancellation } from '../models/errors.js';
import type { ReplyPolicy, Task } from '../models/types.js';

export interface RunTaskOptions {
  policy: ReplyPolicy;
  log?: Logger;
  signal?: AbortSignal;
}

export class TaskRunner {
  constructor(private readonly messenger: Messenger) {}

  /**
   * Run a task once
   * @throws UnknownMethodError for a method other than message or button
   * @throws TaskExecutionError when the remote operation fails
   * @throws CancelledError, unwrapped, when the signal aborts the operation
   */
  async run(task: Task, options: RunTaskOptions): Promise<MessengerOutcome> {
    const action = task.action;

    switch (action.kind) {
      case 'message':
        return this.attempt(task, () =>
          this.messenger.sendText({
            target: task.target,
            text: action.text,
            policy: options.policy,
            log: options.log,
            signal: options.signal,
          })
        );

      case 'button':
        return this.attempt(task, () =>
          this.messenger.clickButton({
            target: task.target,
            label: action.label,
            log: options.log,
            signal: options.signal,
          })
        );

      case 'unknown':
        throw new UnknownMethodError(action.method);
    }
  }

  private async attempt(
    task: Task,
    operation: () => Promise<MessengerOutcome>
  ): Promise<MessengerOutcome> {
    try {
      return await operation();
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      throw new TaskExecutionError(task.name, error);
    }
  }
}
