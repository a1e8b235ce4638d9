/**
 * TelegramBotClient - Client for the Telegram Bot API
 *
 * Covers the three methods a long-polling bot needs: getUpdates,
 * sendMessage and deleteWebhook. Every response is a JSON envelope
 * `{ ok, result, description }`; `ok: false` becomes an ExternalServiceError.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createHttpClient, HTTP_TIMEOUTS } from '../config/httpClient.js';
import { ExternalServiceError } from '../types/errors.js';
import { errorMessage } from '../utils/errorHandling.js';

const chatSchema = z.object({
  id: z.number(),
  type: z.string().optional(),
});

const messageSchema = z.object({
  message_id: z.number(),
  chat: chatSchema,
  text: z.string().optional(),
  date: z.number().optional(),
});

const updateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
});

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramUpdate = z.infer<typeof updateSchema>;

export interface GetUpdatesOptions {
  offset?: number;
  /** Long-poll timeout in seconds */
  timeout: number;
  signal?: AbortSignal;
}

export interface SendMessageOptions {
  replyToMessageId?: number;
}

/**
 * Surface of the Bot API used by the echo bot
 */
export interface BotApi {
  getUpdates(options: GetUpdatesOptions): Promise<TelegramUpdate[]>;
  sendMessage(chatId: number, text: string, options?: SendMessageOptions): Promise<TelegramMessage>;
  deleteWebhook(dropPendingUpdates: boolean): Promise<boolean>;
}

export interface TelegramBotClientConfig {
  token: string;
  apiUrl?: string;
  /** Transport override, used by tests */
  adapter?: AxiosAdapter;
}

export class TelegramBotClient implements BotApi {
  private readonly client: AxiosInstance;

  constructor(config: TelegramBotClientConfig) {
    const apiUrl = (config.apiUrl ?? 'https://api.telegram.org').replace(/\/+$/, '');
    this.client = createHttpClient({
      baseURL: `${apiUrl}/bot${config.token}/`,
      timeout: HTTP_TIMEOUTS.STANDARD,
      // Error statuses still carry the envelope
      validateStatus: () => true,
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
  }

  async getUpdates({ offset, timeout, signal }: GetUpdatesOptions): Promise<TelegramUpdate[]> {
    const result = await this.call('getUpdates', {
      ...(offset !== undefined ? { offset } : {}),
      timeout,
      allowed_updates: ['message'],
    }, {
      // The server holds the request for up to `timeout` seconds
      timeoutMs: (timeout + 10) * 1000,
      signal,
    });
    return this.parse('getUpdates', z.array(updateSchema), result);
  }

  async sendMessage(chatId: number, text: string, options: SendMessageOptions = {}): Promise<TelegramMessage> {
    const result = await this.call('sendMessage', {
      chat_id: chatId,
      text,
      ...(options.replyToMessageId !== undefined
        ? { reply_parameters: { message_id: options.replyToMessageId, allow_sending_without_reply: true } }
        : {}),
    });
    return this.parse('sendMessage', messageSchema, result);
  }

  async deleteWebhook(dropPendingUpdates: boolean): Promise<boolean> {
    const result = await this.call('deleteWebhook', { drop_pending_updates: dropPendingUpdates });
    return this.parse('deleteWebhook', z.boolean(), result);
  }

  /**
   * POST a method call and unwrap the envelope
   * @throws {ExternalServiceError} On transport failure or `ok: false`
   */
  private async call(
    method: string,
    body: Record<string, unknown>,
    options: { timeoutMs?: number; signal?: AbortSignal } = {}
  ): Promise<unknown> {
    let data: unknown;
    let status: number;
    try {
      const response = await this.client.post<unknown>(method, body, {
        ...(options.timeoutMs ? { timeout: options.timeoutMs } : {}),
        ...(options.signal ? { signal: options.signal } : {}),
      });
      data = response.data;
      status = response.status;
    } catch (error) {
      // Cancellation belongs to the caller
      if (axios.isCancel(error)) throw error;
      throw new ExternalServiceError('telegram', `${method} request failed: ${errorMessage(error)}`, { method });
    }

    const envelope = envelopeSchema.safeParse(data);
    if (!envelope.success) {
      throw new ExternalServiceError('telegram', `${method} returned an unexpected response (HTTP ${status})`, { method, status });
    }
    if (!envelope.data.ok) {
      throw new ExternalServiceError(
        'telegram',
        `${method} failed: ${envelope.data.description ?? `HTTP ${status}`}`,
        { method, status, errorCode: envelope.data.error_code }
      );
    }
    return envelope.data.result;
  }

  private parse<T>(method: string, schema: z.ZodType<T>, value: unknown): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new ExternalServiceError('telegram', `${method} result did not match the expected shape`, {
        method,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }
}
