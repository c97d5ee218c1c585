/**
 * Alert Sinks
 *
 * Best-effort outbound delivery of alert text. Sinks never throw: failures
 * are logged and dropped, and nothing is retried.
 */

import { TELEGRAM } from '../config/api.js';
import { getErrorMessage } from '../errors/index.js';

// ============ Interface ============

export interface AlertSink {
  send(text: string): Promise<void>;
}

// ============ Telegram ============

export interface TelegramOptions {
  botToken: string;
  chatId: string;
}

/**
 * Posts Markdown messages through the Telegram Bot API.
 */
export class TelegramAlertSink implements AlertSink {
  constructor(private readonly options: TelegramOptions) {}

  async send(text: string): Promise<void> {
    const url = `${TELEGRAM.API_URL}/bot${this.options.botToken}/sendMessage`;

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: this.options.chatId, text, parse_mode: 'Markdown' }),
        signal: AbortSignal.timeout(TELEGRAM.TIMEOUT_MS),
      });

      // Body is never used; release the connection
      await response.body?.cancel();
      if (!response.ok) {
        console.warn(`[Telegram] sendMessage failed: HTTP ${response.status}`);
      }
    } catch (error: unknown) {
      console.warn(`[Telegram] sendMessage error: ${getErrorMessage(error)}`);
    }
  }
}

// ============ Console ============

/**
 * Prints alerts when no chat transport is configured.
 */
export class ConsoleAlertSink implements AlertSink {
  async send(text: string): Promise<void> {
    console.log(`[Alert]\n${text}`);
  }
}

// ============ Factory ============

export function createAlertSink(config: {
  telegramBotToken: string | null;
  telegramChatId: string | null;
}): AlertSink {
  if (config.telegramBotToken && config.telegramChatId) {
    return new TelegramAlertSink({ botToken: config.telegramBotToken, chatId: config.telegramChatId });
  }
  return new ConsoleAlertSink();
}
