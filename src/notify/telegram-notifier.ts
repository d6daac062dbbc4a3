import { defaultFetch, type HttpFetch, type HttpResponse } from '../utils/http';
import type { Logger } from '../utils/logger';

export type Destination = 'status' | 'trade';

export type NotifyResult =
  | { delivered: true; chatId: string }
  | { delivered: false; chatId: string; error: Error };

export interface Notifier {
  send(text: string, destination?: Destination): Promise<NotifyResult>;
}

export interface TelegramNotifierOptions {
  apiUrl: string;
  botToken: string;
  chatId: string;
  // Falls back to chatId when unset
  tradeChatId?: string;
  timeoutMs?: number;
  fetch?: HttpFetch;
}

/**
 * Posts messages to the Telegram Bot API. The status chat is for people, the
 * trade chat for the execution bot that consumes `/buy` and `/sell` commands.
 */
export class TelegramNotifier implements Notifier {
  private fetchImpl: HttpFetch;
  private timeoutMs: number;

  constructor(private options: TelegramNotifierOptions, private logger: Logger) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  resolveChatId(destination: Destination): string {
    if (destination === 'trade') {
      return this.options.tradeChatId ?? this.options.chatId;
    }
    return this.options.chatId;
  }

  /**
   * Send a Markdown message. Failures are logged and returned, never thrown.
   */
  async send(text: string, destination: Destination = 'status'): Promise<NotifyResult> {
    const chatId = this.resolveChatId(destination);
    const url = `${this.options.apiUrl}/bot${this.options.botToken}/sendMessage`;

    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: chatId,
          text,
          parse_mode: 'Markdown',
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const reply = await response.text();
        const error = new Error(`Telegram API returned HTTP ${response.status}`);
        this.logger.warn({ destination, chatId, status: response.status, reply: reply.slice(0, 200) }, 'Telegram message rejected');
        return { delivered: false, chatId, error };
      }

      await this.discardBody(response);
      this.logger.debug({ destination, chatId }, 'Telegram message sent');
      return { delivered: true, chatId };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      // The request URL carries the bot token, so only the message is logged
      this.logger.error({ destination, chatId, err: failure.message }, 'Telegram error');
      return { delivered: false, chatId, error: failure };
    }
  }

  // The message is already accepted; a body that cannot be read does not undo that
  private async discardBody(response: HttpResponse): Promise<void> {
    try {
      await response.text();
    } catch (error) {
      this.logger.debug({ err: error instanceof Error ? error.message : String(error) }, 'Could not read Telegram reply');
    }
  }
}
