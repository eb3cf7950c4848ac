import { Context } from 'grammy';
import { DatabaseService } from '../services/database.service';
import { Subscription, User } from '../types';
import { NotFoundError } from '../utils/errors';
import { escapeHtml, formatDate } from '../utils/format';
import logger from '../utils/logger';
import { STATUS_LABELS, daysLeft } from '../utils/subscription-status';

const STATUS_ICONS: Record<Subscription['status'], string> = {
  active: '🟢',
  blocked: '🔴',
  expired: '⚪',
  revoked: '⚫'
};

export class StartHandler {
  constructor(
    private db: DatabaseService,
    private now: () => Date = () => new Date()
  ) {}

  async handleStart(ctx: Context) {
    const user = this.rememberUser(ctx);
    const name = ctx.from?.first_name || ctx.from?.username || 'друг';

    const welcomeMessage = `
👋 Привет, ${escapeHtml(name)}!

Я продаю доступ к <b>WireGuard VPN</b>. После оплаты вы сразу получите файл конфигурации и QR-код.

<b>Команды:</b>
/buy - Купить подписку
/mysubs - Мои подписки
/help - Справка
    `.trim();

    await ctx.reply(welcomeMessage, { parse_mode: 'HTML' });
    logger.info('Start command executed', { userId: ctx.from?.id, registered: user !== null });
  }

  async handleHelp(ctx: Context) {
    const user = this.findUser(ctx);

    let helpMessage = `
<b>📖 Справка</b>

/buy - Выбрать тариф и оплатить в Telegram Stars
/mysubs - Список ваших подписок и сколько дней осталось

<b>Как подключиться:</b>
1️⃣ Установите приложение WireGuard
2️⃣ Импортируйте полученный файл или отсканируйте QR-код
3️⃣ Включите туннель
    `.trim();

    if (user?.isAdmin) {
      helpMessage += '\n\n/admin - Команды администратора';
    }

    await ctx.reply(helpMessage, { parse_mode: 'HTML' });
  }

  async handleMySubscriptions(ctx: Context) {
    const user = this.findUser(ctx);
    const subscriptions = user ? this.db.getSubscriptionsByUserId(user.id) : [];

    if (subscriptions.length === 0) {
      await ctx.reply('📭 У вас пока нет подписок. Оформить: /buy');
      return;
    }

    const now = this.now();
    const lines = subscriptions.map((subscription) => {
      let line =
        `${STATUS_ICONS[subscription.status]} <b>#${subscription.id}</b> ${escapeHtml(this.planName(subscription))}` +
        ` - ${STATUS_LABELS[subscription.status]}, до ${formatDate(subscription.endDate)}`;
      if (subscription.status === 'active') {
        line += ` (осталось дней: ${Math.max(daysLeft(subscription.endDate, now), 0)})`;
      }
      return line;
    });

    await ctx.reply(`📋 <b>Ваши подписки:</b>\n\n${lines.join('\n')}`, { parse_mode: 'HTML' });
  }

  private rememberUser(ctx: Context): User | null {
    const from = ctx.from;
    if (!from) return null;
    return this.db.upsertUser({
      telegramId: from.id,
      username: from.username,
      firstName: from.first_name,
      lastName: from.last_name
    });
  }

  private findUser(ctx: Context): User | null {
    const telegramId = ctx.from?.id;
    return telegramId ? this.db.getUserByTelegramId(telegramId) : null;
  }

  private planName(subscription: Subscription): string {
    try {
      return this.db.getPlanById(subscription.planId).name;
    } catch (error) {
      if (error instanceof NotFoundError) return `Тариф #${subscription.planId}`;
      throw error;
    }
  }
}
