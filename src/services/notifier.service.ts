import { Api } from 'grammy';
import { NotificationSink } from '../types';
import logger from '../utils/logger';

/** Отправка уведомлений пользователям через Bot API (HTML-разметка) */
export class TelegramNotifier implements NotificationSink {
  constructor(private api: Api) {}

  async notify(chatId: number, text: string): Promise<void> {
    await this.api.sendMessage(chatId, text, { parse_mode: 'HTML' });
    logger.debug('Notification sent', { chatId });
  }
}
