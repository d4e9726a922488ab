/**
 * Scheduler Unit Tests
 *
 * node-cron is mocked so cron firings are driven by hand; interval
 * entries run on fake timers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Scheduler } from '../../../src/scheduler/scheduler.js';
import { ScheduleError } from '../../../src/models/errors.js';
import { LogCapture, ManualTrigger } from '../../fixtures/test-helpers.js';

interface FakeCronJob {
  expression: string;
  callback: () => void;
  options: unknown;
  start: ReturnType<typeof vi.fn>;
  stop: ReturnType<typeof vi.fn>;
}

const cronMock = vi.hoisted(() => {
  const jobs: FakeCronJob[] = [];
  return { jobs };
});

// Mock node-cron to avoid real scheduling
vi.mock('node-cron', () => ({
  default: {
    validate: () => true,
    schedule: (expression: string, callback: () => void, options: unknown) => {
      const job: FakeCronJob = { expression, callback, options, start: vi.fn(), stop: vi.fn() };
      cronMock.jobs.push(job);
      return job;
    },
  },
}));

function jobAt(index: number): FakeCronJob {
  const job = cronMock.jobs[index];
  if (!job) {
    throw new Error(`no cron job at ${index}`);
  }
  return job;
}

describe('Scheduler', () => {
  let logs: LogCapture;
  let scheduler: Scheduler;

  beforeEach(() => {
    cronMock.jobs.length = 0;
    logs = new LogCapture();
    scheduler = new Scheduler({ logger: logs.logger });
  });

  afterEach(() => {
    scheduler.stop();
    vi.useRealTimers();
  });

  describe('Lifecycle', () => {
    it('should register entries without activating them while stopped', () => {
      const id = scheduler.addTask('0 8 * * *', new ManualTrigger(), { name: 't1' });

      expect(scheduler.state).toBe('stopped');
      expect(cronMock.jobs).toHaveLength(0);
      expect(scheduler.getEntries()).toMatchObject([{ id, name: 't1', expression: '0 8 * * *', kind: 'cron' }]);
    });

    it('should schedule cron entries on start', () => {
      scheduler.addTask('0 8 * * *', new ManualTrigger());
      scheduler.start();

      expect(scheduler.state).toBe('running');
      expect(cronMock.jobs).toHaveLength(1);
      expect(jobAt(0).expression).toBe('0 8 * * *');
      expect(jobAt(0).options).toEqual({ scheduled: true, timezone: undefined });
    });

    it('should map descriptors before scheduling', () => {
      scheduler.addTask('@daily', new ManualTrigger());
      scheduler.start();

      expect(jobAt(0).expression).toBe('0 0 * * *');
    });

    it('should treat start and stop as idempotent', () => {
      scheduler.addTask('0 8 * * *', new ManualTrigger());
      scheduler.start();
      scheduler.start();
      expect(cronMock.jobs).toHaveLength(1);

      scheduler.stop();
      scheduler.stop();
      expect(scheduler.state).toBe('stopped');
      expect(jobAt(0).stop).toHaveBeenCalledTimes(1);
    });

    it('should restart existing cron jobs', () => {
      scheduler.addTask('0 8 * * *', new ManualTrigger());
      scheduler.start();
      scheduler.stop();
      scheduler.start();

      expect(cronMock.jobs).toHaveLength(1);
      expect(jobAt(0).start).toHaveBeenCalledTimes(1);
    });

    it('should activate entries added while running', () => {
      scheduler.start();
      const trigger = new ManualTrigger();
      scheduler.addTask('*/5 * * * *', trigger);

      expect(cronMock.jobs).toHaveLength(1);
      jobAt(0).callback();
      expect(trigger.fired).toBe(1);
    });

    it('should pass the default timezone to cron entries', () => {
      const zoned = new Scheduler({ logger: logs.logger, timezone: 'UTC' });
      zoned.addTask('0 8 * * *', new ManualTrigger());
      zoned.addTask('0 9 * * *', new ManualTrigger(), { timezone: 'Asia/Tokyo' });
      zoned.start();

      expect(jobAt(0).options).toEqual({ scheduled: true, timezone: 'UTC' });
      expect(jobAt(1).options).toEqual({ scheduled: true, timezone: 'Asia/Tokyo' });
      zoned.stop();
    });
  });

  describe('Registration', () => {
    it('should throw ScheduleError and keep other entries', () => {
      scheduler.addTask('0 8 * * *', new ManualTrigger(), { name: 't1' });

      expect(() => scheduler.addTask('not-a-cron', new ManualTrigger(), { name: 't2' })).toThrow(ScheduleError);
      expect(scheduler.size).toBe(1);
      expect(scheduler.getEntries()[0]?.name).toBe('t1');
    });

    it('should accept a plain function as trigger', () => {
      const fn = vi.fn();
      scheduler.addTask('0 8 * * *', fn);
      scheduler.start();
      jobAt(0).callback();

      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should remove entries', () => {
      const id = scheduler.addTask('0 8 * * *', new ManualTrigger());
      scheduler.start();

      expect(scheduler.removeTask(id)).toBe(true);
      expect(jobAt(0).stop).toHaveBeenCalledTimes(1);
      expect(scheduler.size).toBe(0);
      expect(scheduler.removeTask(id)).toBe(false);
    });

    it('should report the next run of cron entries', () => {
      const id = scheduler.addTask('0 8 * * *', new ManualTrigger());
      const next = scheduler.getNextRun(id);

      expect(next).toBeInstanceOf(Date);
      expect(next?.getHours()).toBe(8);
      expect(next?.getMinutes()).toBe(0);
      expect(scheduler.getNextRun('missing')).toBeUndefined();
    });
  });

  describe('Firing', () => {
    it('should isolate a trigger that throws', () => {
      const healthy = new ManualTrigger();
      scheduler.addTask('0 8 * * *', new ManualTrigger(() => {
        throw new Error('boom');
      }), { name: 'broken' });
      scheduler.addTask('0 9 * * *', healthy, { name: 'healthy' });
      scheduler.start();

      expect(() => jobAt(0).callback()).not.toThrow();
      jobAt(1).callback();

      expect(healthy.fired).toBe(1);
      const failure = logs.find('Schedule trigger failed');
      expect(failure?.task).toBe('broken');
      expect(failure?.schedule).toBe('0 8 * * *');
    });

    it('should fire interval entries every period', async () => {
      vi.useFakeTimers();
      const trigger = new ManualTrigger();
      scheduler.addTask('@every 2s', trigger);
      scheduler.start();

      await vi.advanceTimersByTimeAsync(6_000);
      expect(trigger.fired).toBe(3);

      scheduler.stop();
      await vi.advanceTimersByTimeAsync(6_000);
      expect(trigger.fired).toBe(3);
    });

    it('should wait the full period for intervals beyond the timer limit', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date(0));
      const day = 24 * 60 * 60 * 1000;
      const trigger = new ManualTrigger();
      const id = scheduler.addTask('@every 720h', trigger);
      scheduler.start();

      await vi.advanceTimersByTimeAsync(200);
      expect(trigger.fired).toBe(0);

      await vi.advanceTimersByTimeAsync(29 * day - 200);
      expect(trigger.fired).toBe(0);
      expect(scheduler.getNextRun(id)?.getTime()).toBe(30 * day);

      await vi.advanceTimersByTimeAsync(day);
      expect(trigger.fired).toBe(1);
      expect(scheduler.getNextRun(id)?.getTime()).toBe(60 * day);
    });

    it('should stop re-arming a long interval once stopped', async () => {
      vi.useFakeTimers();
      const trigger = new ManualTrigger();
      scheduler.addTask('@every 720h', trigger);
      scheduler.start();

      await vi.advanceTimersByTimeAsync(25 * 24 * 60 * 60 * 1000);
      scheduler.stop();

      expect(vi.getTimerCount()).toBe(0);
      expect(trigger.fired).toBe(0);
    });

    it('should report the next interval firing', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date(10_000));
      const id = scheduler.addTask('@every 5s', new ManualTrigger());
      scheduler.start();

      expect(scheduler.getNextRun(id)?.getTime()).toBe(15_000);
      expect(scheduler.getEntries()[0]?.kind).toBe('interval');
    });
  });
});
