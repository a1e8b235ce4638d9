/**
 * EchoBot - long-polling loop that answers every text message with the same text
 */

import type { Logger } from 'pino';
import type { BotApi, TelegramUpdate } from '../../clients/TelegramBotClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { delay as defaultDelay } from '../../utils/errorHandling.js';

export interface EchoBotOptions {
  pollTimeoutSeconds: number;
  errorDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Reply text for an incoming message
 */
export function echoReply(text: string): string {
  return text;
}

export class EchoBot {
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private offset: number | undefined;
  private running = false;
  private abortController: AbortController | null = null;

  constructor(
    private readonly api: BotApi,
    private readonly options: EchoBotOptions
  ) {
    this.log = createChildLogger({ component: 'echo-bot' });
    this.sleep = options.sleep ?? defaultDelay;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Poll until stop() is called; resolves once the loop has ended
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('EchoBot is already running');
    }
    this.running = true;

    // Stale messages from before the start are not answered
    await this.api.deleteWebhook(true);
    this.log.info({ pollTimeoutSeconds: this.options.pollTimeoutSeconds }, 'Echo bot started (polling)');

    while (this.running) {
      let updates: TelegramUpdate[];
      this.abortController = new AbortController();
      try {
        updates = await this.api.getUpdates({
          offset: this.offset,
          timeout: this.options.pollTimeoutSeconds,
          signal: this.abortController.signal,
        });
      } catch (error) {
        if (!this.running) break;
        this.log.error({ error }, 'Polling failed');
        await this.sleep(this.options.errorDelayMs);
        continue;
      } finally {
        this.abortController = null;
      }

      for (const update of updates) {
        this.offset = update.update_id + 1;
        await this.handleUpdate(update);
      }
    }

    this.log.info('Echo bot stopped');
  }

  stop(): void {
    this.running = false;
    this.abortController?.abort();
  }

  /**
   * Answer one update; a failed reply is logged, not thrown
   */
  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message;
    if (!message || message.text === undefined) {
      return;
    }

    try {
      await this.api.sendMessage(message.chat.id, echoReply(message.text), {
        replyToMessageId: message.message_id,
      });
      this.log.debug({ chatId: message.chat.id, updateId: update.update_id }, 'Message echoed');
    } catch (error) {
      this.log.error({ error, chatId: message.chat.id, updateId: update.update_id }, 'Reply failed');
    }
  }
}
