/**
 * Scheduler Engine
 *
 * Process-wide timer engine. Each entry binds one schedule expression
 * to one Trigger; the engine owns timing and the trigger owns the side
 * effect. Triggers must return promptly: their only job is a
 * non-blocking submission to an executor.
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { SchedulerState } from '../models/types.js';
import { nextRun, parseSchedule, type ParsedSchedule, type ScheduleKind } from './schedule-parser.js';

/**
 * Something that fires on a schedule
 */
export interface Trigger {
  fire(): void;
}

export interface SchedulerOptions {
  logger: Logger;
  timezone?: string;    // Cron entries only; default is process local time
}

export interface AddTaskOptions {
  name?: string;        // Used in log events
  timezone?: string;
}

/**
 * Diagnostic view of one entry
 */
export interface ScheduleEntry {
  id: string;
  name?: string;
  expression: string;
  kind: ScheduleKind;
  timezone?: string;
  next_run?: Date;
}

interface RegisteredEntry {
  id: string;
  name?: string;
  schedule: ParsedSchedule;
  timezone?: string;
  trigger: Trigger;
  cronJob?: ScheduledTask;
  timer?: NodeJS.Timeout;
  nextIntervalAt?: number;
}

// Longest delay Node timers honour; larger values fire after 1ms
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export class Scheduler {
  private readonly entries: Map<string, RegisteredEntry> = new Map();
  private readonly log: Logger;
  private readonly timezone?: string;
  private currentState: SchedulerState = 'stopped';

  constructor(options: SchedulerOptions) {
    this.log = options.logger;
    this.timezone = options.timezone;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Register a schedule entry. Entries added while running activate immediately.
   * @returns entry id
   * @throws ScheduleError when the expression is malformed
   */
  addTask(expression: string, trigger: Trigger | (() => void), options: AddTaskOptions = {}): string {
    const schedule = parseSchedule(expression);
    const entry: RegisteredEntry = {
      id: uuidv4(),
      name: options.name,
      schedule,
      timezone: schedule.kind === 'cron' ? options.timezone ?? this.timezone : undefined,
      trigger: typeof trigger === 'function' ? { fire: trigger } : trigger,
    };

    this.entries.set(entry.id, entry);
    if (this.currentState === 'running') {
      this.activate(entry);
    }

    this.log.debug(
      { entry_id: entry.id, task: entry.name, schedule: schedule.expression, kind: schedule.kind },
      'Schedule entry added'
    );
    return entry.id;
  }

  /**
   * Remove an entry
   * @returns false when the id is unknown
   */
  removeTask(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) {
      return false;
    }
    this.deactivate(entry);
    this.entries.delete(id);
    return true;
  }

  /**
   * Start firing entries. Calling start on a running scheduler does nothing.
   */
  start(): void {
    if (this.currentState === 'running') {
      return;
    }
    this.currentState = 'running';
    for (const entry of this.entries.values()) {
      this.activate(entry);
    }
    this.log.info({ entries: this.entries.size }, 'Scheduler started');
  }

  /**
   * Stop future firings. Work already submitted is unaffected.
   */
  stop(): void {
    if (this.currentState === 'stopped') {
      return;
    }
    this.currentState = 'stopped';
    for (const entry of this.entries.values()) {
      this.deactivate(entry);
    }
    this.log.info('Scheduler stopped');
  }

  getEntries(): ScheduleEntry[] {
    return [...this.entries.values()].map((entry) => ({
      id: entry.id,
      name: entry.name,
      expression: entry.schedule.expression,
      kind: entry.schedule.kind,
      timezone: entry.timezone,
      next_run: this.nextRunOf(entry),
    }));
  }

  /**
   * Next firing time of an entry
   * @returns undefined for an unknown id
   */
  getNextRun(id: string): Date | undefined {
    const entry = this.entries.get(id);
    return entry ? this.nextRunOf(entry) : undefined;
  }

  private activate(entry: RegisteredEntry): void {
    const { schedule } = entry;

    if (schedule.kind === 'interval') {
      entry.nextIntervalAt = Date.now() + schedule.everyMs;
      this.armInterval(entry, schedule.everyMs);
      return;
    }

    if (entry.cronJob) {
      entry.cronJob.start();
      return;
    }
    entry.cronJob = cron.schedule(schedule.cron, () => this.fire(entry), {
      scheduled: true,
      timezone: entry.timezone,
    });
  }

  /**
   * Arm one timeout toward nextIntervalAt. Periods beyond the timer limit
   * are covered by several timeouts, firing only once the deadline passes.
   */
  private armInterval(entry: RegisteredEntry, everyMs: number): void {
    const due = entry.nextIntervalAt ?? Date.now() + everyMs;
    const delay = Math.min(Math.max(due - Date.now(), 0), MAX_TIMER_DELAY_MS);

    entry.timer = setTimeout(() => {
      const deadline = entry.nextIntervalAt;
      if (deadline === undefined) {
        return;
      }
      const now = Date.now();
      if (now >= deadline) {
        // Missed periods are skipped, not replayed
        entry.nextIntervalAt = deadline + everyMs > now ? deadline + everyMs : now + everyMs;
        this.fire(entry);
      }
      if (entry.timer !== undefined) {
        this.armInterval(entry, everyMs);
      }
    }, delay);
  }

  private deactivate(entry: RegisteredEntry): void {
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = undefined;
      entry.nextIntervalAt = undefined;
    }
    entry.cronJob?.stop();
  }

  private fire(entry: RegisteredEntry): void {
    try {
      entry.trigger.fire();
    } catch (error) {
      this.log.error(
        { err: error, entry_id: entry.id, task: entry.name, schedule: entry.schedule.expression },
        'Schedule trigger failed'
      );
    }
  }

  private nextRunOf(entry: RegisteredEntry): Date | undefined {
    if (entry.schedule.kind === 'interval' && entry.nextIntervalAt !== undefined) {
      return new Date(entry.nextIntervalAt);
    }
    try {
      return nextRun(entry.schedule, new Date(), entry.timezone);
    } catch (error) {
      this.log.warn({ err: error, entry_id: entry.id }, 'Failed to compute next run');
      return undefined;
    }
  }
}
