/**
 * Task Executor Tests
 *
 * Worker pool behaviour against a recording messenger and in-memory
 * account and task logs.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TaskExecutor, type TaskExecutorOptions } from '../../../src/executors/task-executor.js';
import { TaskRunner } from '../../../src/executors/task-runner.js';
import { CancelledError } from '../../../src/models/errors.js';
import {
  FakeMessenger,
  LEVEL,
  LogCapture,
  MemoryTaskLogs,
  TestHelpers,
} from '../../fixtures/test-helpers.js';

describe('TaskExecutor', () => {
  let messenger: FakeMessenger;
  let logs: LogCapture;
  let taskLogs: MemoryTaskLogs;
  let controller: AbortController;

  const createExecutor = (options?: Partial<TaskExecutorOptions>): TaskExecutor =>
    new TaskExecutor({
      runner: new TaskRunner(messenger),
      logger: logs.logger,
      accountName: 'acme',
      taskLoggerFactory: taskLogs.factory,
      ...options,
    });

  beforeEach(() => {
    messenger = new FakeMessenger();
    logs = new LogCapture();
    taskLogs = new MemoryTaskLogs();
    controller = new AbortController();
  });

  describe('Construction', () => {
    it('should replace non-positive limits with defaults', () => {
      const executor = createExecutor({ workerCount: 0, queueSize: 0 });
      expect(executor.workerCount).toBe(4);
      expect(executor.queueSize).toBe(100);

      const negative = createExecutor({ workerCount: -2, queueSize: -5 });
      expect(negative.workerCount).toBe(4);
      expect(negative.queueSize).toBe(100);
    });

    it('should keep positive limits', () => {
      const executor = createExecutor({ workerCount: 2, queueSize: 7 });
      expect(executor.workerCount).toBe(2);
      expect(executor.queueSize).toBe(7);
    });

    it('should move through its lifecycle states', async () => {
      const executor = createExecutor();
      expect(executor.getState()).toBe('created');

      executor.start(controller.signal);
      expect(executor.getState()).toBe('running');
      expect(() => executor.start(controller.signal)).toThrow('cannot start from state running');

      await executor.stop();
      expect(executor.getState()).toBe('stopped');
      await executor.stop();
      expect(executor.getState()).toBe('stopped');
    });
  });

  describe('Execution', () => {
    it('should run a submitted task and log start and completion', async () => {
      const executor = createExecutor();
      executor.start(controller.signal);

      expect(executor.submitTask(TestHelpers.createTask(), logs.logger, 'scheduled')).toBe(true);
      await executor.stop();

      expect(messenger.sent).toHaveLength(1);
      const started = logs.find('Executing scheduled task');
      expect(started?.thread_id).toBe(0);
      expect(started?.thread_name).toBe('checkin');
      expect(started?.task).toBe('checkin');
      expect(started?.request_id).toMatch(/^[0-9a-f-]{36}$/);
      expect(logs.find('Task completed, no reply')?.level).toBe(LEVEL.info);
    });

    it('should log the reply text when one arrives', async () => {
      messenger.defaultTextOutcome = { responseType: 'reply', messageId: 3, reply: 'Checked in, +10 points' };
      const executor = createExecutor();
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask(), logs.logger, 'scheduled');
      await executor.stop();

      const completed = logs.find('Task completed');
      expect(completed?.reply).toBe('Checked in, +10 points');
      expect(completed?.response_type).toBe('reply');
      expect(logs.find('Task completed, no reply')).toBeUndefined();
    });

    it('should log the URL of a button answer', async () => {
      messenger.defaultButtonOutcome = { responseType: 'callback_url', url: 'https://example.test/game' };
      const executor = createExecutor();
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask({ method: 'button', payload: 'Play' }), logs.logger, 'scheduled');
      await executor.stop();

      expect(logs.find('Task completed')?.url).toBe('https://example.test/game');
    });

    it.each([
      ['run_on_start', 'Executing startup task', 'Startup task failed'],
      ['scheduled', 'Executing scheduled task', 'Scheduled task failed'],
      ['once', 'Executing task', 'Task failed'],
    ] as const)('should name %s events', async (trigger, startMessage, failureMessage) => {
      const executor = createExecutor({ workerCount: 1 });
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask({ method: 'unknown' }), logs.logger, trigger);
      await executor.stop();

      expect(logs.find(startMessage)).toBeDefined();
      expect(logs.find(failureMessage)?.level).toBe(LEVEL.error);
    });

    it('should keep working after a task fails', async () => {
      const executor = createExecutor({ workerCount: 1 });
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask({ name: 'bad', method: 'unknown', payload: 'x' }), logs.logger, 'scheduled');
      executor.submitTask(TestHelpers.createTask({ name: 'good' }), logs.logger, 'scheduled');
      await executor.stop();

      const failed = logs.find('Scheduled task failed');
      expect(failed?.task).toBe('bad');
      expect(failed?.error).toBe('unknown method "unknown"');
      expect(failed?.payload).toBe('x');
      expect(logs.find('Task completed, no reply')?.task).toBe('good');
      expect(messenger.sent).toHaveLength(1);
    });

    it('should log messenger failures without rethrowing', async () => {
      messenger.defaultTextOutcome = new Error('PEER_ID_INVALID');
      const executor = createExecutor();
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask({ name: 'daily' }), logs.logger, 'once');
      await executor.stop();

      expect(logs.find('Task failed')?.error).toBe('Task daily failed: PEER_ID_INVALID');
      expect(executor.getState()).toBe('stopped');
    });

    it('should log a cancelled task as cancelled, not failed', async () => {
      messenger.defaultTextOutcome = new CancelledError('reply wait cancelled');
      const executor = createExecutor();
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask({ name: 'daily' }), logs.logger, 'scheduled');
      await executor.stop();

      const cancelled = logs.find('Task cancelled');
      expect(cancelled?.level).toBe(LEVEL.info);
      expect(cancelled?.task).toBe('daily');
      expect(cancelled?.trigger).toBe('scheduled');
      expect(logs.find('Scheduled task failed')).toBeUndefined();
      expect(taskLogs.opened[0]?.capture.find('Task cancelled')).toBeDefined();
      expect(taskLogs.opened[0]?.closed).toBe(1);
    });

    it('should never run more tasks at once than it has workers', async () => {
      messenger.hold();
      const executor = createExecutor({ workerCount: 2 });
      executor.start(controller.signal);

      for (let i = 0; i < 5; i++) {
        executor.submitTask(TestHelpers.createTask({ name: `t${i}` }), logs.logger, 'scheduled');
      }
      await TestHelpers.flush();
      expect(messenger.active).toBe(2);
      expect(executor.queueLength).toBe(3);

      messenger.unhold();
      await executor.stop();
      expect(messenger.sent).toHaveLength(5);
      expect(messenger.maxActive).toBe(2);
    });
  });

  describe('Reply policy', () => {
    it('should resolve the policy per task', async () => {
      const executor = createExecutor({
        resolvePolicy: (task) => ({ wait_seconds: task.reply_wait_seconds + 1, history_limit: 2 }),
      });
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask({ reply_wait_seconds: 4 }), logs.logger, 'scheduled');
      await executor.stop();

      expect(messenger.sent[0]?.policy).toEqual({ wait_seconds: 5, history_limit: 2 });
    });

    it('should default to the task policy with built-in fallbacks', async () => {
      const executor = createExecutor();
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask({ reply_wait_seconds: 6 }), logs.logger, 'scheduled');
      await executor.stop();

      expect(messenger.sent[0]?.policy).toEqual({ wait_seconds: 6, history_limit: 10 });
    });

    it('should use built-in defaults when the task sets nothing', async () => {
      const executor = createExecutor();
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask({ reply_history_limit: 25 }), logs.logger, 'scheduled');
      executor.submitTask(TestHelpers.createTask({ payload: '/plain' }), logs.logger, 'scheduled');
      await executor.stop();

      const policies = new Map(messenger.sent.map((request) => [request.text, request.policy]));
      expect(policies.get('/checkin')).toEqual({ wait_seconds: 3, history_limit: 25 });
      expect(policies.get('/plain')).toEqual({ wait_seconds: 3, history_limit: 10 });
    });
  });

  describe('Task log files', () => {
    it('should write the same events to a dedicated task log', async () => {
      const executor = createExecutor({ logDir: '/tmp/checkin-logs', logFormat: 'json' });
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask(), logs.logger, 'scheduled');
      await executor.stop();

      expect(taskLogs.opened).toHaveLength(1);
      const sink = taskLogs.opened[0];
      expect(sink?.options).toMatchObject({
        dir: '/tmp/checkin-logs',
        account: 'acme',
        task: 'checkin',
        trigger: 'scheduled',
        format: 'json',
      });
      expect(sink?.capture.messages()).toEqual(['Executing scheduled task', 'Task completed, no reply']);
      expect(sink?.capture.lines[0]?.target).toBe('@test_bot');
      expect(sink?.capture.lines[0]?.account).toBe('acme');
      expect(sink?.closed).toBe(1);
    });

    it('should fall back to the account log when the task log cannot be opened', async () => {
      taskLogs.failWith = new Error('EACCES');
      const executor = createExecutor();
      executor.start(controller.signal);

      executor.submitTask(TestHelpers.createTask(), logs.logger, 'scheduled');
      await executor.stop();

      expect(logs.find('Failed to create task log file, using main log')?.level).toBe(LEVEL.error);
      expect(logs.filter('Executing scheduled task')).toHaveLength(1);
      expect(logs.filter('Task completed, no reply')).toHaveLength(1);
      expect(messenger.sent).toHaveLength(1);
    });
  });

  describe('Submission', () => {
    it('should drop exactly the task that overflows the queue', () => {
      const executor = createExecutor({ queueSize: 2 });

      const results = ['t1', 't2', 't3'].map((name) =>
        executor.submitTask(TestHelpers.createTask({ name }), logs.logger, 'scheduled')
      );

      expect(results).toEqual([true, true, false]);
      const dropped = logs.filter('Task queue is full, dropping task');
      expect(dropped).toHaveLength(1);
      expect(dropped[0]?.task).toBe('t3');
      expect(dropped[0]?.trigger).toBe('scheduled');
      expect(dropped[0]?.code).toBe('QUEUE_FULL');
      expect(dropped[0]?.level).toBe(LEVEL.warn);
    });

    it('should refuse submissions after stop', async () => {
      const executor = createExecutor();
      executor.start(controller.signal);
      await executor.stop();

      expect(executor.submitTask(TestHelpers.createTask(), logs.logger, 'scheduled')).toBe(false);
      expect(logs.find('Task executor stopped, dropping task')).toBeDefined();
      expect(logs.find('Task queue is full, dropping task')).toBeUndefined();
    });

    it('should block until space frees up', async () => {
      messenger.hold();
      const executor = createExecutor({ workerCount: 1, queueSize: 1 });
      executor.start(controller.signal);

      expect(await executor.submitTaskBlocking(controller.signal, TestHelpers.createTask({ name: 't1' }), logs.logger, 'once')).toBe(true);
      expect(await executor.submitTaskBlocking(controller.signal, TestHelpers.createTask({ name: 't2' }), logs.logger, 'once')).toBe(true);

      let accepted: boolean | undefined;
      const third = executor
        .submitTaskBlocking(controller.signal, TestHelpers.createTask({ name: 't3' }), logs.logger, 'once')
        .then((result) => {
          accepted = result;
        });
      await TestHelpers.flush();
      expect(accepted).toBeUndefined();

      messenger.unhold();
      await third;
      expect(accepted).toBe(true);

      await executor.stop();
      expect(messenger.sent.map((request) => request.text)).toHaveLength(3);
    });

    it('should return false when the signal aborts while blocked', async () => {
      const executor = createExecutor({ queueSize: 1 });
      await executor.submitTaskBlocking(controller.signal, TestHelpers.createTask(), logs.logger, 'once');

      const blocked = executor.submitTaskBlocking(controller.signal, TestHelpers.createTask(), logs.logger, 'once');
      controller.abort();

      expect(await blocked).toBe(false);
    });

    it('should release blocked submitters on stop', async () => {
      const executor = createExecutor({ queueSize: 1 });
      await executor.submitTaskBlocking(controller.signal, TestHelpers.createTask(), logs.logger, 'once');

      const blocked = executor.submitTaskBlocking(controller.signal, TestHelpers.createTask(), logs.logger, 'once');
      await executor.stop();

      expect(await blocked).toBe(false);
    });
  });

  describe('Stop', () => {
    it('should drain queued work before returning', async () => {
      messenger.hold();
      const executor = createExecutor({ workerCount: 1 });
      executor.start(controller.signal);
      for (let i = 0; i < 3; i++) {
        executor.submitTask(TestHelpers.createTask({ name: `t${i}` }), logs.logger, 'scheduled');
      }

      const stopped = executor.stop();
      messenger.unhold();
      await stopped;

      expect(messenger.sent).toHaveLength(3);
      expect(logs.find('Discarded queued tasks on shutdown')).toBeUndefined();
    });

    it('should discard queued work once the signal has aborted', async () => {
      messenger.hold();
      const executor = createExecutor({ workerCount: 1 });
      executor.start(controller.signal);
      for (let i = 0; i < 3; i++) {
        executor.submitTask(TestHelpers.createTask({ name: `t${i}` }), logs.logger, 'scheduled');
      }
      await TestHelpers.flush();

      controller.abort();
      const stopped = executor.stop();
      messenger.unhold();
      await stopped;

      expect(messenger.sent).toHaveLength(1);
      expect(logs.find('Discarded queued tasks on shutdown')?.discarded).toBe(2);
    });
  });
});
