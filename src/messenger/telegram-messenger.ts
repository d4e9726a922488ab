/**
 * Telegram Messenger
 *
 * MessengerSession over a gramjs user client. The string session is
 * persisted under session/<name>.session so later runs skip login.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'node:readline/promises';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { Api, TelegramClient, sessions } from 'telegram';
import { LogLevel } from 'telegram/extensions/Logger.js';
import { CancelledError } from '../models/errors.js';
import type {
  ClickButtonRequest,
  MessengerCredentials,
  MessengerFactory,
  MessengerOptions,
  MessengerOutcome,
  MessengerSession,
  SendTextRequest,
} from './messenger.js';
import { classifyCallbackAnswer, parseProxy, pickReply } from './replies.js';

export const SESSION_DIR = 'session';

export class TelegramMessenger implements MessengerSession {
  private readonly client: TelegramClient;
  private readonly session: sessions.StringSession;
  private readonly sessionFile: string;
  private readonly log: Logger;
  private readonly appId: number;
  private readonly appHash: string;

  constructor(options: MessengerOptions) {
    this.log = options.logger;
    this.appId = options.app_id;
    this.appHash = options.app_hash;
    this.sessionFile = path.join(SESSION_DIR, `${options.session_name}.session`);
    this.session = new sessions.StringSession(readSession(this.sessionFile));

    const proxy = parseProxy(options.proxy);
    if (proxy) {
      this.log.info({ proxy: `${proxy.ip}:${proxy.port}` }, 'Using proxy connection');
    }

    this.client = new TelegramClient(this.session, options.app_id, options.app_hash, {
      connectionRetries: 5,
      proxy,
    });
    this.client.setLogLevel(LogLevel.ERROR);
  }

  async connect(): Promise<void> {
    await this.client.connect();
    this.log.debug({ session_file: this.sessionFile }, 'Connected');
  }

  /**
   * Log in unless the stored session is still authorized.
   * Phone login when a phone is configured, QR login otherwise.
   */
  async authenticate(credentials: MessengerCredentials): Promise<void> {
    if (await this.client.checkAuthorization()) {
      this.log.info('Session already authorized');
      return;
    }

    let failure: Error | undefined;
    const onError = async (error: Error): Promise<boolean> => {
      failure = error;
      return true;
    };

    try {
      if (credentials.phone) {
        this.log.info({ phone: credentials.phone }, 'Starting phone login');
        await this.client.start({
          phoneNumber: credentials.phone,
          password: async () => credentials.password,
          phoneCode: async () => promptLine(`Please enter verification code for ${credentials.phone}: `),
          onError,
        });
      } else {
        this.log.info('No phone number provided, trying QR code login');
        await this.client.signInUserWithQrCode(
          { apiId: this.appId, apiHash: this.appHash },
          {
            qrCode: async (code) => {
              const url = `tg://login?token=${code.token.toString('base64url')}`;
              this.log.info({ url, expires: code.expires }, 'Scan the QR login URL with the Telegram app');
            },
            password: async () => credentials.password,
            onError,
          }
        );
      }
    } catch (error) {
      throw failure ?? error;
    }

    saveSession(this.sessionFile, this.session.save());
    this.log.info({ session_file: this.sessionFile }, 'Login successful, session saved');
  }

  async sendText(request: SendTextRequest): Promise<MessengerOutcome> {
    const log = (request.log ?? this.log).child({ target: request.target });
    const peer = await this.client.getInputEntity(request.target);

    const sent = await this.client.sendMessage(peer, { message: request.text });
    log.info({ response_type: 'message', message_id: sent.id }, 'Message sent');

    const { wait_seconds, history_limit } = request.policy;
    log.info({ wait_seconds }, 'Waiting for reply');
    await sleep(wait_seconds * 1000, request.signal);

    let history: Api.Message[];
    try {
      history = await this.client.getMessages(peer, { limit: history_limit });
    } catch (error) {
      log.warn({ err: error }, 'Failed to get message history');
      return { responseType: 'message', messageId: sent.id };
    }

    const reply = pickReply(
      history.map((message) => ({ id: message.id, out: message.out ?? false, text: message.message })),
      sent.id
    );
    if (!reply?.text) {
      return { responseType: 'message', messageId: sent.id };
    }

    if (request.log) {
      this.log.info({ target: request.target, reply: reply.text }, 'Received reply');
    }
    log.info({ reply: reply.text }, 'Received reply');
    return { responseType: 'reply', messageId: sent.id, reply: reply.text };
  }

  async clickButton(request: ClickButtonRequest): Promise<MessengerOutcome> {
    const log = (request.log ?? this.log).child({ target: request.target });
    const peer = await this.client.getInputEntity(request.target);

    const [latest] = await this.client.getMessages(peer, { limit: 1 });
    if (!latest) {
      throw new Error('no messages found');
    }
    const markup = latest.replyMarkup;
    if (!markup) {
      throw new Error('latest message has no buttons');
    }
    if (!(markup instanceof Api.ReplyInlineMarkup)) {
      throw new Error('no inline markup found');
    }

    for (const row of markup.rows) {
      for (const button of row.buttons) {
        if (!(button instanceof Api.KeyboardButtonCallback) || button.text !== request.label) {
          continue;
        }

        const answer = await this.client.invoke(
          new Api.messages.GetBotCallbackAnswer({ peer, msgId: latest.id, data: button.data })
        );
        const outcome = classifyCallbackAnswer({ message: answer.message, url: answer.url, alert: answer.alert });
        log.info(
          {
            response_type: outcome.responseType,
            alert: answer.alert ?? false,
            has_url: answer.hasUrl ?? false,
            cache_time: answer.cacheTime,
          },
          'Button clicked'
        );
        return { ...outcome, messageId: latest.id };
      }
    }

    throw new Error(`button with text "${request.label}" not found`);
  }

  async close(): Promise<void> {
    await this.client.destroy();
    this.log.debug('Disconnected');
  }
}

export const createTelegramMessenger: MessengerFactory = (options) => new TelegramMessenger(options);

function readSession(file: string): string {
  try {
    return fs.readFileSync(file, 'utf-8').trim();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return '';
    }
    throw error;
  }
}

function saveSession(file: string, value: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, value, { mode: 0o600 });
}

async function promptLine(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError('reply wait cancelled');
    }
    throw error;
  }
}
