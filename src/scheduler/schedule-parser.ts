/**
 * Schedule Expressions
 *
 * Accepted forms:
 *   - 5-field cron: "0 8 * * *"
 *   - descriptors: @yearly @annually @monthly @weekly @daily @midnight @hourly
 *   - fixed intervals: "@every 90s", "@every 1h30m"
 */

import cron from 'node-cron';
import { CronExpressionParser } from 'cron-parser';
import { ScheduleError, getErrorMessage } from '../models/errors.js';

export type ScheduleKind = 'cron' | 'interval';

export type ParsedSchedule =
  | { kind: 'cron'; expression: string; cron: string }
  | { kind: 'interval'; expression: string; everyMs: number };

export const MIN_INTERVAL_MS = 1000;

const DESCRIPTORS: Record<string, string> = {
  '@yearly': '0 0 1 1 *',
  '@annually': '0 0 1 1 *',
  '@monthly': '0 0 1 * *',
  '@weekly': '0 0 * * 0',
  '@daily': '0 0 * * *',
  '@midnight': '0 0 * * *',
  '@hourly': '0 * * * *',
};

const EVERY_PREFIX = '@every';

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse a schedule expression
 * @throws ScheduleError when the expression is empty or malformed
 */
export function parseSchedule(expression: string): ParsedSchedule {
  const trimmed = expression.trim();
  if (trimmed === '') {
    throw new ScheduleError(expression, 'empty expression');
  }

  if (trimmed.startsWith('@')) {
    const [head = '', ...rest] = trimmed.split(/\s+/);
    const descriptor = head.toLowerCase();

    if (descriptor === EVERY_PREFIX) {
      if (rest.length !== 1 || rest[0] === undefined) {
        throw new ScheduleError(expression, 'expected "@every <duration>"');
      }
      const everyMs = parseDuration(expression, rest[0]);
      if (everyMs < MIN_INTERVAL_MS) {
        throw new ScheduleError(expression, 'interval must be at least 1s');
      }
      return { kind: 'interval', expression: trimmed, everyMs };
    }

    const mapped = DESCRIPTORS[descriptor];
    if (mapped === undefined || rest.length > 0) {
      throw new ScheduleError(expression, `unknown descriptor ${head}`);
    }
    return { kind: 'cron', expression: trimmed, cron: mapped };
  }

  const fields = trimmed.split(/\s+/);
  if (fields.length !== 5) {
    throw new ScheduleError(expression, `expected 5 fields, got ${fields.length}`);
  }
  const normalized = fields.join(' ');

  if (!cron.validate(normalized)) {
    throw new ScheduleError(expression, 'invalid cron expression');
  }
  try {
    CronExpressionParser.parse(normalized);
  } catch (error) {
    throw new ScheduleError(expression, getErrorMessage(error));
  }

  return { kind: 'cron', expression: trimmed, cron: normalized };
}

/**
 * Parse a duration such as "300ms", "1.5h" or "2h45m"
 * @returns milliseconds
 */
export function parseDuration(expression: string, value: string): number {
  const pattern = /(\d+(?:\.\d+)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;
  let total = 0;
  let offset = 0;

  while (offset < value.length) {
    pattern.lastIndex = offset;
    const match = pattern.exec(value);
    const amount = match?.[1];
    const unit = match?.[2];
    const factor = unit === undefined ? undefined : UNIT_MS[unit];
    if (!match || amount === undefined || factor === undefined) {
      throw new ScheduleError(expression, `invalid duration "${value}"`);
    }
    total += Number(amount) * factor;
    offset = pattern.lastIndex;
  }

  if (offset === 0) {
    throw new ScheduleError(expression, `invalid duration "${value}"`);
  }
  return Math.round(total);
}

/**
 * Next firing time after `from`
 */
export function nextRun(schedule: ParsedSchedule, from: Date = new Date(), timezone?: string): Date {
  if (schedule.kind === 'interval') {
    return new Date(from.getTime() + schedule.everyMs);
  }
  return CronExpressionParser.parse(schedule.cron, { currentDate: from, tz: timezone })
    .next()
    .toDate();
}
