import { existsSync, readFileSync } from 'fs';
import { createInterface } from 'readline/promises';
import { Api, TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions/index.js';
import { saveText } from './storage.js';
import type { IterMessagesOptions, Logger, MessageSource, SourceMessage } from './types.js';

export interface TelegramConfig {
  apiId: number;
  apiHash: string;
  /** Session string; when empty the session file is read, then an interactive login runs. */
  session?: string;
  sessionFile: string;
  phoneNumber?: string;
}

/** Session from config, else from the session file, else empty. */
export function readSavedSession(config: TelegramConfig): string {
  if (config.session) return config.session;
  if (existsSync(config.sessionFile)) {
    return readFileSync(config.sessionFile, 'utf-8').trim();
  }
  return '';
}

/** Keeps the auth key owner-readable only; a session given through config is never written. */
export function storeSession(value: string, config: TelegramConfig): boolean {
  if (config.session) return false;
  saveText(value, config.sessionFile, 0o600);
  return true;
}

async function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

export class TelegramFetcher implements MessageSource {
  readonly interactiveLogin: boolean;
  private client: TelegramClient;
  private session: StringSession;
  private config: TelegramConfig;
  private logger: Logger;

  constructor(config: TelegramConfig, logger: Logger = console) {
    this.config = config;
    this.logger = logger;

    const saved = readSavedSession(config);
    this.interactiveLogin = saved === '';

    this.session = new StringSession(saved);
    this.client = new TelegramClient(this.session, config.apiId, config.apiHash, {
      connectionRetries: 5,
    });
  }

  async connect(): Promise<void> {
    const { phoneNumber } = this.config;

    await this.client.start({
      phoneNumber: phoneNumber ? phoneNumber : () => ask('Phone number: '),
      phoneCode: () => ask('Login code: '),
      password: () => ask('Two-factor password: '),
      onError: (err) => {
        this.logger.error('Telegram login failed:', err.message);
        return Promise.resolve(true);
      },
    });

    storeSession(this.session.save(), this.config);
    this.logger.log('Connected to Telegram');
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }

  async *iterMessages(channel: string, options: IterMessagesOptions): AsyncIterable<SourceMessage> {
    const iterator = this.client.iterMessages(channel, {
      limit: options.limit,
      reverse: options.reverse ?? false,
      offsetDate: options.offsetDate ? Math.floor(options.offsetDate.getTime() / 1000) : undefined,
    });

    for await (const msg of iterator) {
      if (!(msg instanceof Api.Message)) continue;
      yield {
        id: msg.id,
        date: new Date(msg.date * 1000),
        text: msg.message,
        hasPhoto: msg.photo !== undefined,
      };
    }
  }
}
