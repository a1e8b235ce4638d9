import { describe, it, expect } from 'vitest';
import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { TelegramBotClient } from '../../../../src/server/clients/TelegramBotClient.js';
import { ExternalServiceError } from '../../../../src/server/types/errors.js';

interface RecordedCall {
  baseURL?: string;
  url?: string;
  timeout?: number;
  body: unknown;
}

function fakeApi(respond: (method: string) => { status: number; data: unknown }) {
  const calls: RecordedCall[] = [];
  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    calls.push({
      baseURL: config.baseURL,
      url: config.url,
      timeout: config.timeout,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
    });
    const { status, data } = respond(config.url ?? '');
    return { data, status, statusText: String(status), headers: {}, config };
  };
  return { calls, adapter };
}

describe('TelegramBotClient', () => {
  it('long-polls getUpdates and strips unknown fields', async () => {
    const api = fakeApi(() => ({
      status: 200,
      data: {
        ok: true,
        result: [
          {
            update_id: 5,
            message: { message_id: 1, chat: { id: 42, type: 'private' }, text: 'hello', from: { id: 7 } },
          },
        ],
      },
    }));
    const client = new TelegramBotClient({ token: 'test-token', apiUrl: 'https://api.test/', adapter: api.adapter });

    const updates = await client.getUpdates({ offset: 5, timeout: 30 });

    expect(updates).toEqual([
      { update_id: 5, message: { message_id: 1, chat: { id: 42, type: 'private' }, text: 'hello' } },
    ]);
    expect(api.calls).toEqual([
      {
        baseURL: 'https://api.test/bottest-token/',
        url: 'getUpdates',
        timeout: 40000,
        body: { offset: 5, timeout: 30, allowed_updates: ['message'] },
      },
    ]);
  });

  it('sends a reply to the same chat', async () => {
    const api = fakeApi(() => ({
      status: 200,
      data: { ok: true, result: { message_id: 2, chat: { id: 42 }, text: 'hello' } },
    }));
    const client = new TelegramBotClient({ token: 'test-token', adapter: api.adapter });

    const sent = await client.sendMessage(42, 'hello', { replyToMessageId: 1 });

    expect(sent).toEqual({ message_id: 2, chat: { id: 42 }, text: 'hello' });
    expect(api.calls[0]?.baseURL).toBe('https://api.telegram.org/bottest-token/');
    expect(api.calls[0]?.body).toEqual({
      chat_id: 42,
      text: 'hello',
      reply_parameters: { message_id: 1, allow_sending_without_reply: true },
    });
  });

  it('drops pending updates when deleting the webhook', async () => {
    const api = fakeApi(() => ({ status: 200, data: { ok: true, result: true } }));
    const client = new TelegramBotClient({ token: 'test-token', adapter: api.adapter });

    await expect(client.deleteWebhook(true)).resolves.toBe(true);
    expect(api.calls[0]?.body).toEqual({ drop_pending_updates: true });
  });

  it('turns an ok:false envelope into ExternalServiceError', async () => {
    const api = fakeApi(() => ({ status: 401, data: { ok: false, error_code: 401, description: 'Unauthorized' } }));
    const client = new TelegramBotClient({ token: 'test-token', adapter: api.adapter });

    const attempt = client.getUpdates({ timeout: 0 });

    await expect(attempt).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(attempt).rejects.toThrow('External service error (telegram): getUpdates failed: Unauthorized');
  });

  it('rejects a response that is not an envelope', async () => {
    const api = fakeApi(() => ({ status: 502, data: '<html>Bad Gateway</html>' }));
    const client = new TelegramBotClient({ token: 'test-token', adapter: api.adapter });

    await expect(client.getUpdates({ timeout: 0 })).rejects.toThrow(
      'External service error (telegram): getUpdates returned an unexpected response (HTTP 502)'
    );
  });

  it('wraps transport failures', async () => {
    const adapter: AxiosAdapter = async () => {
      throw new Error('socket hang up');
    };
    const client = new TelegramBotClient({ token: 'test-token', adapter });

    await expect(client.sendMessage(42, 'hello')).rejects.toThrow(
      'External service error (telegram): sendMessage request failed: socket hang up'
    );
  });
});
