import { z } from 'zod';
import { toToolError } from './http';
import { defineTool, skipped, type SkippedResult, type ToolContext } from './types';

const TELEGRAM_API = 'https://api.telegram.org';

export interface SentNotification {
  status: 'sent';
}

/**
 * Notify the owner through a Telegram bot.
 */
export function createSendTelegramTool({ config, http, logger }: ToolContext) {
  return defineTool({
    name: 'send_telegram',
    description:
      'Send a Markdown message to the owner through the Telegram bot. Use it for the daily report and important alerts.',
    parameters: z.object({
      message: z.string().min(1).describe('Message text (Telegram Markdown)'),
    }),
    async run({ message }): Promise<SentNotification | SkippedResult> {
      const { telegramBotToken, telegramChatId } = config.notifications;
      if (!telegramBotToken || !telegramChatId) {
        return skipped('TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID not configured');
      }

      try {
        await http.post(`${TELEGRAM_API}/bot${telegramBotToken}/sendMessage`, {
          chat_id: telegramChatId,
          text: message,
          parse_mode: 'Markdown',
        });
      } catch (error) {
        throw toToolError('send_telegram', 'Telegram', error);
      }

      logger.info({ tool: 'send_telegram' }, 'Telegram notification sent');
      return { status: 'sent' };
    },
  });
}
