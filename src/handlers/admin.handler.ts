import { Context } from 'grammy';
import { DatabaseService } from '../services/database.service';
import { ClientProvisioner, Subscription, SubscriptionStatus } from '../types';
import { NotFoundError, TimeoutError, describeError } from '../utils/errors';
import { displayName, escapeHtml, formatDate } from '../utils/format';
import logger from '../utils/logger';
import { SessionStore } from '../utils/session-store';
import { STATUS_LABELS, canTransition, daysLeft } from '../utils/subscription-status';
import { withTimeout } from '../utils/timeout';

export type AddServerStep = 'ip' | 'port' | 'user' | 'password' | 'max_clients';

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

const ADMIN_ONLY = '⛔ Эта команда доступна только администраторам.';
const HOST_PATTERN = /^[A-Za-z0-9.-]+$/;

export class AdminHandler {
  constructor(
    private db: DatabaseService,
    private provisioning: ClientProvisioner,
    private adminIds: number[],
    private actionTimeoutMs: number,
    private sessions: SessionStore<AddServerStep> = new SessionStore<AddServerStep>()
  ) {}

  isAdmin(userId?: number): boolean {
    return userId ? this.adminIds.includes(userId) : false;
  }

  async handleServers(ctx: Context) {
    if (!this.isAdmin(ctx.from?.id)) {
      await ctx.reply(ADMIN_ONLY);
      return;
    }

    const servers = this.db.getAllServers();
    if (servers.length === 0) {
      await ctx.reply('📝 Серверы ещё не добавлены. Используйте /addserver.');
      return;
    }

    const list = servers
      .map(
        (s) =>
          `#${s.id} ${s.isActive ? '🟢' : '🔴'} <code>${escapeHtml(s.ip)}:${s.port}</code>\n` +
          `   Пользователь: ${escapeHtml(s.sshUser)}, клиентов: ${s.currentClients}/${s.maxClients}`
      )
      .join('\n\n');

    await ctx.reply(`🖥 <b>Серверы (${servers.length}):</b>\n\n${list}`, { parse_mode: 'HTML' });
  }

  async handleAddServer(ctx: Context) {
    const userId = ctx.from?.id;
    if (!userId || !this.isAdmin(userId)) {
      await ctx.reply(ADMIN_ONLY);
      return;
    }

    this.sessions.start(userId, 'ip');
    await ctx.reply('🖥 Добавление сервера.\n\nВведите IP-адрес или имя хоста (или /cancel для отмены):');
  }

  async handleCancel(ctx: Context) {
    const userId = ctx.from?.id;
    if (userId && this.sessions.clear(userId)) {
      await ctx.reply('❎ Действие отменено.');
    } else {
      await ctx.reply('Нет активного действия.');
    }
  }

  /** @returns true, если сообщение относилось к диалогу добавления сервера */
  async handleDialogText(ctx: Context): Promise<boolean> {
    const userId = ctx.from?.id;
    const text = ctx.message?.text?.trim();
    if (!userId || text === undefined || text.startsWith('/')) return false;

    const session = this.sessions.get(userId);
    if (!session || !this.isAdmin(userId)) return false;

    switch (session.state) {
      case 'ip':
        if (!HOST_PATTERN.test(text)) {
          await ctx.reply('❌ Некорректный адрес. Введите IP-адрес или имя хоста:');
          return true;
        }
        this.sessions.advance(userId, 'port', { ip: text });
        await ctx.reply('Введите SSH-порт (обычно 22):');
        return true;

      case 'port': {
        const port = Number(text);
        if (!Number.isInteger(port) || port < 1 || port > 65535) {
          await ctx.reply('❌ Порт должен быть числом от 1 до 65535.');
          return true;
        }
        this.sessions.advance(userId, 'user', { port: text });
        await ctx.reply('Введите имя SSH-пользователя:');
        return true;
      }

      case 'user':
        if (/\s/.test(text)) {
          await ctx.reply('❌ Имя пользователя не может содержать пробелы.');
          return true;
        }
        this.sessions.advance(userId, 'password', { user: text });
        await ctx.reply('Введите SSH-пароль:');
        return true;

      case 'password':
        this.sessions.advance(userId, 'max_clients', { password: text });
        try {
          await ctx.deleteMessage();
        } catch (error) {
          logger.warn('Failed to delete message with password', { userId, error: describeError(error) });
        }
        await ctx.reply('Пароль сохранён. Введите максимальное число клиентов на сервере:');
        return true;

      case 'max_clients': {
        const maxClients = Number(text);
        if (!Number.isInteger(maxClients) || maxClients < 1) {
          await ctx.reply('❌ Введите целое число больше нуля.');
          return true;
        }

        const { ip, port, user, password } = session.data;
        this.sessions.clear(userId);
        const server = this.db.addServer({
          ip,
          port: Number(port),
          sshUser: user,
          sshPassword: password,
          maxClients
        });

        logger.info('Server added by admin', { adminId: userId, serverId: server.id });
        await ctx.reply(
          `✅ Сервер #${server.id} добавлен: <code>${escapeHtml(server.ip)}:${server.port}</code>\n\n` +
            `Запустите настройку командой /setupserver ${server.id}`,
          { parse_mode: 'HTML' }
        );
        return true;
      }
    }
  }

  async handleSetupServer(ctx: Context) {
    if (!this.isAdmin(ctx.from?.id)) {
      await ctx.reply(ADMIN_ONLY);
      return;
    }

    const id = this.parseId(ctx);
    if (id === null) {
      await ctx.reply('Использование: /setupserver <id сервера>');
      return;
    }

    try {
      const server = this.db.getServerById(id);
      await ctx.reply(`⏳ Настраиваю сервер #${id}...`);

      await this.runWithDeadline(ctx, `Настройка сервера #${id}`, this.provisioning.setupServer(server), (result) =>
        result.ok
          ? `✅ Сервер #${id} настроен и готов к работе.`
          : `❌ Не удалось настроить сервер #${id}: ${escapeHtml(describeError(result.error))}`
      );
      logger.info('Setup server command executed', { adminId: ctx.from?.id, serverId: id });
    } catch (error) {
      await this.replyError(ctx, 'setupserver', error);
    }
  }

  async handleSubscription(ctx: Context) {
    if (!this.isAdmin(ctx.from?.id)) {
      await ctx.reply(ADMIN_ONLY);
      return;
    }

    const id = this.parseId(ctx);
    if (id === null) {
      await ctx.reply('Использование: /sub <id подписки>');
      return;
    }

    try {
      const subscription = this.db.getSubscriptionById(id);
      await ctx.reply(this.describeSubscription(subscription), { parse_mode: 'HTML' });

      if (subscription.status === 'active' || subscription.status === 'blocked') {
        const server = this.db.getServerById(subscription.serverId);
        await this.runWithDeadline(
          ctx,
          `Проверка подписки #${id}`,
          this.provisioning.isClientBlocked(server, subscription.configFilePath),
          (result) => {
            if (!result.ok) {
              return `⚠️ Не удалось проверить пир на сервере: ${escapeHtml(describeError(result.error))}`;
            }
            return result.value ? '🔴 На сервере пир заблокирован.' : '🟢 На сервере пир активен.';
          }
        );
      }
    } catch (error) {
      await this.replyError(ctx, 'sub', error);
    }
  }

  handleBlock(ctx: Context) {
    return this.changeBlocked(ctx, true);
  }

  handleUnblock(ctx: Context) {
    return this.changeBlocked(ctx, false);
  }

  async handleRevoke(ctx: Context) {
    if (!this.isAdmin(ctx.from?.id)) {
      await ctx.reply(ADMIN_ONLY);
      return;
    }

    const id = this.parseId(ctx);
    if (id === null) {
      await ctx.reply('Использование: /revoke <id подписки>');
      return;
    }

    try {
      const subscription = this.db.getSubscriptionById(id);
      if (!canTransition(subscription.status, 'revoked')) {
        await ctx.reply(`❌ Подписку со статусом «${STATUS_LABELS[subscription.status]}» нельзя отозвать.`);
        return;
      }

      const server = this.db.getServerById(subscription.serverId);
      // Статус меняется сразу, даже если сервер недоступен
      this.db.updateSubscription({ ...subscription, status: 'revoked' });
      logger.info('Subscription revoked by admin', { adminId: ctx.from?.id, subscriptionId: id });

      await this.runWithDeadline(
        ctx,
        `Отзыв подписки #${id}`,
        this.provisioning.revokeClientConfig(server, subscription.configFilePath),
        (result) => {
          if (!result.ok) {
            return (
              `⚠️ Подписка #${id} отмечена как отозванная, но удалить конфиг с сервера не удалось: ` +
              escapeHtml(describeError(result.error))
            );
          }
          this.db.releaseServerSlot(server.id);
          return `✅ Подписка #${id} отозвана, конфиг удалён с сервера.`;
        }
      );
    } catch (error) {
      await this.replyError(ctx, 'revoke', error);
    }
  }

  async handleAdminHelp(ctx: Context) {
    if (!this.isAdmin(ctx.from?.id)) {
      await ctx.reply(ADMIN_ONLY);
      return;
    }

    const helpMessage = `
<b>🔐 Команды администратора</b>

<b>Серверы:</b>
/servers - Список серверов
/addserver - Добавить сервер
/setupserver &lt;id&gt; - Установить и настроить WireGuard

<b>Подписки:</b>
/sub &lt;id&gt; - Информация о подписке
/block &lt;id&gt; - Заблокировать доступ
/unblock &lt;id&gt; - Разблокировать доступ
/revoke &lt;id&gt; - Отозвать подписку

/cancel - Отменить текущее действие
    `.trim();

    await ctx.reply(helpMessage, { parse_mode: 'HTML' });
  }

  private async changeBlocked(ctx: Context, blocked: boolean) {
    if (!this.isAdmin(ctx.from?.id)) {
      await ctx.reply(ADMIN_ONLY);
      return;
    }

    const command = blocked ? 'block' : 'unblock';
    const id = this.parseId(ctx);
    if (id === null) {
      await ctx.reply(`Использование: /${command} <id подписки>`);
      return;
    }

    const target: SubscriptionStatus = blocked ? 'blocked' : 'active';
    const verb = blocked ? 'заблокировать' : 'разблокировать';

    try {
      const subscription = this.db.getSubscriptionById(id);
      if (!canTransition(subscription.status, target)) {
        await ctx.reply(`❌ Подписку со статусом «${STATUS_LABELS[subscription.status]}» нельзя ${verb}.`);
        return;
      }

      const server = this.db.getServerById(subscription.serverId);
      const operation = blocked
        ? this.provisioning.blockClient(server, subscription.configFilePath)
        : this.provisioning.unblockClient(server, subscription.configFilePath);

      await this.runWithDeadline(ctx, `${blocked ? 'Блокировка' : 'Разблокировка'} подписки #${id}`, operation, (result) => {
        if (!result.ok) {
          return `❌ Не удалось ${verb} подписку #${id}: ${escapeHtml(describeError(result.error))}`;
        }

        const fresh = this.db.getSubscriptionById(id);
        if (canTransition(fresh.status, target)) {
          this.db.updateSubscription({ ...fresh, status: target });
        }
        logger.info(`Subscription ${blocked ? 'blocked' : 'unblocked'} by admin`, {
          adminId: ctx.from?.id,
          subscriptionId: id
        });
        return `✅ Подписка #${id} ${blocked ? 'заблокирована' : 'разблокирована'}.`;
      });
    } catch (error) {
      await this.replyError(ctx, command, error);
    }
  }

  /**
   * Ждёт удалённую операцию не дольше actionTimeoutMs. Если она не успела,
   * администратор получает её результат отдельным сообщением позже.
   */
  private async runWithDeadline<T>(
    ctx: Context,
    label: string,
    operation: Promise<T>,
    describe: (result: Settled<T>) => string
  ): Promise<void> {
    const settled = operation.then(
      (value): Settled<T> => ({ ok: true, value }),
      (error: unknown): Settled<T> => ({ ok: false, error })
    );

    const render = (result: Settled<T>): string => {
      try {
        return describe(result);
      } catch (error) {
        logger.error('Failed to apply operation result', { label, error: describeError(error) });
        return `❌ ${label}: ${escapeHtml(describeError(error))}`;
      }
    };

    let result: Settled<T>;
    try {
      result = await withTimeout(settled, this.actionTimeoutMs, label);
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;

      const chatId = ctx.chat?.id;
      await ctx.reply(
        `⏳ ${label} ещё выполняется (дольше ${Math.ceil(this.actionTimeoutMs / 1000)} с). ` +
          'Результат пришлю отдельным сообщением.'
      );
      void settled
        .then(async (late) => {
          const text = render(late);
          if (chatId !== undefined) {
            await ctx.api.sendMessage(chatId, text, { parse_mode: 'HTML' });
          }
        })
        .catch((sendError: unknown) => {
          logger.error('Failed to send operation result', { label, error: describeError(sendError) });
        });
      return;
    }

    await ctx.reply(render(result), { parse_mode: 'HTML' });
  }

  private describeSubscription(subscription: Subscription): string {
    const lines = [`📄 <b>Подписка #${subscription.id}</b>`];

    try {
      const user = this.db.getUserById(subscription.userId);
      lines.push(`Пользователь: ${escapeHtml(displayName(user))} (${user.telegramId})`);
    } catch (error) {
      lines.push(`Пользователь: #${subscription.userId} (не найден)`);
    }

    try {
      lines.push(`Тариф: ${escapeHtml(this.db.getPlanById(subscription.planId).name)}`);
    } catch (error) {
      lines.push(`Тариф: #${subscription.planId} (не найден)`);
    }

    const left = Math.max(daysLeft(subscription.endDate, new Date()), 0);
    lines.push(
      `Сервер: #${subscription.serverId}`,
      `Статус: ${STATUS_LABELS[subscription.status]}`,
      `Действует до: ${formatDate(subscription.endDate)} (осталось дней: ${left})`,
      `Конфиг: <code>${escapeHtml(subscription.configFilePath)}</code>`
    );
    return lines.join('\n');
  }

  private parseId(ctx: Context): number | null {
    const arg = ctx.message?.text?.split(' ').filter(Boolean)[1];
    const id = Number(arg);
    return arg && Number.isInteger(id) && id > 0 ? id : null;
  }

  private async replyError(ctx: Context, command: string, error: unknown) {
    if (error instanceof NotFoundError) {
      await ctx.reply(`❌ Не найдено: ${escapeHtml(error.message)}`);
      return;
    }
    logger.error('Admin command failed', { command, adminId: ctx.from?.id, error: describeError(error) });
    await ctx.reply(`❌ Ошибка: ${escapeHtml(describeError(error))}`);
  }
}
