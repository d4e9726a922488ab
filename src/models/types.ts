/**
 * Check-in Runner Type Definitions
 *
 * Runtime types shared by the scheduler, executor and orchestrator.
 * Configuration file shapes live in config/schema.ts.
 */

import type { Logger } from 'pino';

/**
 * Task Methods
 */
export type TaskMethod =
  | 'message'        // Send the payload as a text message
  | 'button';        // Click the inline button labelled with the payload

/**
 * Task Action
 *
 * The task method resolved once when the task snapshot is built.
 * An unrecognised method is kept as `unknown` so the failure surfaces
 * on execution, for that task only.
 */
export type TaskAction =
  | MessageAction
  | ButtonAction
  | UnknownAction;

export interface MessageAction {
  kind: 'message';
  text: string;
}

export interface ButtonAction {
  kind: 'button';
  label: string;
}

export interface UnknownAction {
  kind: 'unknown';
  method: string;
}

/**
 * Task Definition
 *
 * Immutable snapshot of one configured task.
 */
export interface Task {
  readonly name: string;                 // Falls back to target when empty
  readonly target: string;               // Username, link or numeric ID
  readonly action: TaskAction;
  readonly payload: string;              // Raw payload, kept for failure logs
  readonly schedule: string;             // Cron or interval expression, '' = not time-triggered
  readonly enabled: boolean;
  readonly run_on_start: boolean;
  readonly reply_wait_seconds: number;   // 0 = inherit
  readonly reply_history_limit: number;  // 0 = inherit
}

/**
 * Trigger Types
 */
export type TriggerType =
  | 'run_on_start'   // Submitted once when the account session starts
  | 'scheduled'      // Fired by a schedule entry
  | 'once';          // Run-once mode

/**
 * Task Request
 *
 * One queued execution. The worker id is assigned at dequeue.
 */
export interface TaskRequest {
  id: string;
  task: Task;
  trigger: TriggerType;
  logger: Logger;
  submitted_at: string;
  worker_id?: number;
}

/**
 * Resolved Reply Policy
 */
export interface ReplyPolicy {
  wait_seconds: number;
  history_limit: number;
}

/**
 * Fields that can carry a reply policy override, at any level
 */
export interface ReplyPolicySource {
  reply_wait_seconds: number;
  reply_history_limit: number;
}

/**
 * Executor lifecycle
 */
export type ExecutorState = 'created' | 'running' | 'stopping' | 'stopped';

/**
 * Scheduler lifecycle
 */
export type SchedulerState = 'stopped' | 'running';
