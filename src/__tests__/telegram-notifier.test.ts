/**
 * Telegram notifier
 *
 * Messages go to the status chat unless sent to the trade chat, which falls
 * back to the status chat. Transport failures are returned, never thrown.
 */

import { TelegramNotifier, type TelegramNotifierOptions } from '../notify/telegram-notifier';
import { createChildLogger } from '../utils/logger';
import { jsonResponse, mockFetch } from './helpers/fakes';

const logger = createChildLogger('telegram-test');

function notifier(
  fetch: ReturnType<typeof mockFetch>,
  overrides: Partial<TelegramNotifierOptions> = {}
): TelegramNotifier {
  return new TelegramNotifier({
    apiUrl: 'https://relay.test',
    botToken: 'test-token',
    chatId: '-100',
    tradeChatId: '-200',
    fetch,
    ...overrides,
  }, logger);
}

function sentBody(fetch: ReturnType<typeof mockFetch>, call = 0): unknown {
  return JSON.parse(String(fetch.mock.calls[call][1].body));
}

describe('TelegramNotifier', () => {
  describe('resolveChatId', () => {
    it('should use the status chat for status messages', () => {
      expect(notifier(mockFetch()).resolveChatId('status')).toBe('-100');
    });

    it('should use the trade chat for trade messages', () => {
      expect(notifier(mockFetch()).resolveChatId('trade')).toBe('-200');
    });

    it('should fall back to the status chat when no trade chat is set', () => {
      expect(notifier(mockFetch(), { tradeChatId: undefined }).resolveChatId('trade')).toBe('-100');
    });
  });

  describe('send', () => {
    it('should POST a Markdown message to the bot sendMessage endpoint', async () => {
      const fetch = mockFetch(jsonResponse({ ok: true }));

      const result = await notifier(fetch).send('🚀 Trading bot started');

      expect(result).toEqual({ delivered: true, chatId: '-100' });
      const [url, init] = fetch.mock.calls[0];
      expect(url).toBe('https://relay.test/bottest-token/sendMessage');
      expect(init.method).toBe('POST');
      expect(sentBody(fetch)).toEqual({
        chat_id: '-100',
        text: '🚀 Trading bot started',
        parse_mode: 'Markdown',
      });
    });

    it('should send trade commands to the trade chat', async () => {
      const fetch = mockFetch(jsonResponse({ ok: true }));

      await notifier(fetch).send('/buy FOO 0.1', 'trade');

      expect(sentBody(fetch)).toEqual({ chat_id: '-200', text: '/buy FOO 0.1', parse_mode: 'Markdown' });
    });

    it('should report a rejected message without throwing', async () => {
      const fetch = mockFetch(jsonResponse({ ok: false, description: 'Unauthorized' }, 401));

      const result = await notifier(fetch).send('hello');

      expect(result.delivered).toBe(false);
      expect(result.delivered === false && result.error.message).toBe('Telegram API returned HTTP 401');
    });

    it('should report a network failure without throwing', async () => {
      const fetch = mockFetch(new TypeError('fetch failed'));

      const result = await notifier(fetch).send('hello', 'trade');

      expect(result).toEqual({ delivered: false, chatId: '-200', error: new TypeError('fetch failed') });
    });

    it('should read the reply body on success', async () => {
      const text = jest.fn(async () => '{"ok":true}');
      const fetch = mockFetch({ ok: true, status: 200, json: async () => ({ ok: true }), text });

      const result = await notifier(fetch).send('hello');

      expect(result.delivered).toBe(true);
      expect(text).toHaveBeenCalledTimes(1);
    });

    it('should log the reply of a rejected message', async () => {
      const fetch = mockFetch(jsonResponse({ ok: false, description: 'Unauthorized' }, 401));
      const warnSpy = jest.spyOn(logger, 'warn');

      await notifier(fetch).send('hello');

      expect(warnSpy).toHaveBeenCalledWith({
        destination: 'status',
        chatId: '-100',
        status: 401,
        reply: '{"ok":false,"description":"Unauthorized"}',
      }, 'Telegram message rejected');
      warnSpy.mockRestore();
    });

    it('should not retry a failed message', async () => {
      const fetch = mockFetch(new TypeError('fetch failed'), jsonResponse({ ok: true }));

      await notifier(fetch).send('hello');

      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should log failures without the bot token', async () => {
      const fetch = mockFetch(new TypeError('fetch failed'));
      const errorSpy = jest.spyOn(logger, 'error');

      await notifier(fetch).send('hello');

      expect(errorSpy).toHaveBeenCalledWith(
        { destination: 'status', chatId: '-100', err: 'fetch failed' },
        'Telegram error'
      );
      errorSpy.mockRestore();
    });
  });
});
