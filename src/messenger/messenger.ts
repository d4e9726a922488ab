/**
 * Messenger
 *
 * Capability that performs the remote action for a task. One session
 * is shared by all workers of an account, so implementations must be
 * safe to call concurrently.
 */

import type { Logger } from 'pino';
import type { ReplyPolicy } from '../models/types.js';

/**
 * How the remote side answered
 */
export type ResponseType =
  | 'message'              // Text sent, no reply found
  | 'reply'                // Text sent and a reply was found in history
  | 'callback_answer'      // Button callback answered with text
  | 'callback_url'         // Button callback answered with a URL
  | 'callback_empty';      // Button callback answered with nothing

export interface MessengerOutcome {
  responseType: ResponseType;
  messageId?: number;
  reply?: string;
  url?: string;
}

export interface SendTextRequest {
  target: string;
  text: string;
  policy: ReplyPolicy;
  log?: Logger;            // Task log; events go here as well as the session log
  signal?: AbortSignal;
}

export interface ClickButtonRequest {
  target: string;
  label: string;
  log?: Logger;
  signal?: AbortSignal;
}

export interface Messenger {
  sendText(request: SendTextRequest): Promise<MessengerOutcome>;
  clickButton(request: ClickButtonRequest): Promise<MessengerOutcome>;
}

export interface MessengerCredentials {
  phone: string;
  password: string;
}

/**
 * A long-lived authenticated session
 */
export interface MessengerSession extends Messenger {
  connect(): Promise<void>;
  authenticate(credentials: MessengerCredentials): Promise<void>;
  close(): Promise<void>;
}

export interface MessengerOptions {
  app_id: number;
  app_hash: string;
  session_name: string;
  proxy: string;
  logger: Logger;
}

export type MessengerFactory = (options: MessengerOptions) => MessengerSession;
