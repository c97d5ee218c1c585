import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleAlertSink, TelegramAlertSink, createAlertSink } from '../src/notifications/alert-sink.js';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('TelegramAlertSink', () => {
  it('posts Markdown messages to the bot api', async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
        new Response('{"ok":true}', { status: 200 })
    );
    vi.stubGlobal('fetch', fetchMock);

    await new TelegramAlertSink({ botToken: 'test-secret', chatId: '42' }).send('*hello*');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.telegram.org/bottest-secret/sendMessage');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ chat_id: '42', text: '*hello*', parse_mode: 'Markdown' }));
  });

  it('logs and swallows delivery failures', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubGlobal(
      'fetch',
      vi.fn(async (): Promise<Response> => {
        throw new Error('offline');
      })
    );

    await expect(new TelegramAlertSink({ botToken: 'test-secret', chatId: '42' }).send('x')).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith('[Telegram] sendMessage error: offline');
  });

  it('releases the response body', async () => {
    const cancel = vi.fn();
    vi.stubGlobal('fetch', vi.fn(async (): Promise<Response> => new Response(new ReadableStream({ cancel }))));

    await new TelegramAlertSink({ botToken: 'test-secret', chatId: '42' }).send('x');

    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('logs a rejected request', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubGlobal('fetch', vi.fn(async (): Promise<Response> => new Response('{}', { status: 401 })));

    await new TelegramAlertSink({ botToken: 'test-secret', chatId: '42' }).send('x');

    expect(warn).toHaveBeenCalledWith('[Telegram] sendMessage failed: HTTP 401');
  });
});

describe('createAlertSink', () => {
  it('uses Telegram only when both token and chat are set', () => {
    expect(createAlertSink({ telegramBotToken: 'test-secret', telegramChatId: '42' })).toBeInstanceOf(TelegramAlertSink);
    expect(createAlertSink({ telegramBotToken: 'test-secret', telegramChatId: null })).toBeInstanceOf(ConsoleAlertSink);
  });

  it('prints alerts to the console as a fallback', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await new ConsoleAlertSink().send('arb!');

    expect(log).toHaveBeenCalledWith('[Alert]\narb!');
  });
});
