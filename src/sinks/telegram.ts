import type { TelegramConfig } from '@lib/config';
import { errorMessage } from '@lib/errors';
import { notifyLogger } from '@lib/logger';
import type { NotificationSink } from '@lib/sinks';

export const NOTIFY_TIMEOUT_MS = 10_000;
const TELEGRAM_API = 'https://api.telegram.org';

export function createTelegramSink(
  config: TelegramConfig,
  timeoutMs: number = NOTIFY_TIMEOUT_MS,
): NotificationSink {
  const url = `${TELEGRAM_API}/bot${config.token}/sendMessage`;

  return {
    enabled: true,

    async send(text: string): Promise<boolean> {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      try {
        const res = await fetch(url, {
          method: 'POST',
          headers: { 'content-type': 'application/json' },
          body: JSON.stringify({
            chat_id: config.chatId,
            text,
            parse_mode: 'Markdown',
          }),
          signal: controller.signal,
        });
        if (200 !== res.status) {
          const body = await res.text().catch(() => '');
          notifyLogger.error(
            { status: res.status, body },
            'Telegram API rejected message',
          );
          return false;
        }
        notifyLogger.info('Telegram message sent');
        return true;
      } catch (e) {
        notifyLogger.error(
          {
            err: controller.signal.aborted ? 'timeout' : errorMessage(e),
          },
          'Telegram message failed',
        );
        return false;
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

export function createNoopSink(): NotificationSink {
  return {
    enabled: false,
    async send(): Promise<boolean> {
      notifyLogger.debug('Notifications not configured, skipping message');
      return false;
    },
  };
}

export function createNotificationSink(
  config: TelegramConfig | undefined,
): NotificationSink {
  return config ? createTelegramSink(config) : createNoopSink();
}
