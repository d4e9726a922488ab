/**
 * Reply Helpers
 *
 * Network-free pieces of the Telegram messenger.
 */

import { ConfigError } from '../models/errors.js';
import type { MessengerOutcome } from './messenger.js';

/**
 * Minimal view of a history message
 */
export interface HistoryMessage {
  id: number;
  out: boolean;        // Sent by this session
  text: string;
}

export interface CallbackAnswer {
  message?: string;
  url?: string;
  alert?: boolean;
}

export interface ProxySettings {
  ip: string;
  port: number;
  socksType: 5;
  username?: string;
  password?: string;
}

/**
 * Find the reply to a sent message
 *
 * History is newest first. The reply is the newest incoming message
 * newer than the sent one; with no sent id, the newest incoming message.
 */
export function pickReply(history: readonly HistoryMessage[], sentId?: number): HistoryMessage | undefined {
  return history.find((message) => !message.out && (!sentId || message.id > sentId));
}

/**
 * Classify a bot callback answer: text, else URL, else empty
 */
export function classifyCallbackAnswer(answer: CallbackAnswer | undefined): MessengerOutcome {
  if (answer?.message) {
    return { responseType: 'callback_answer', reply: answer.message };
  }
  if (answer?.url) {
    return { responseType: 'callback_url', url: answer.url };
  }
  return { responseType: 'callback_empty' };
}

/**
 * Parse a SOCKS5 proxy address: "host:port" or "socks5://[user:pass@]host:port"
 * @returns undefined for an empty value
 * @throws ConfigError for anything else that does not parse
 */
export function parseProxy(value: string): ProxySettings | undefined {
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }

  const withScheme = trimmed.includes('://') ? trimmed : `socks5://${trimmed}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (error) {
    throw new ConfigError(`invalid proxy "${value}"`, { cause: error });
  }

  if (url.protocol !== 'socks5:' && url.protocol !== 'socks5h:') {
    throw new ConfigError(`unsupported proxy scheme "${url.protocol.replace(/:$/, '')}"`);
  }

  const port = Number(url.port);
  if (!url.hostname || !Number.isInteger(port) || port <= 0) {
    throw new ConfigError(`invalid proxy "${value}": host and port are required`);
  }

  const settings: ProxySettings = { ip: url.hostname, port, socksType: 5 };
  if (url.username) {
    settings.username = decodeURIComponent(url.username);
    settings.password = decodeURIComponent(url.password);
  }
  return settings;
}
