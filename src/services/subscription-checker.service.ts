import { ClientRevoker, NotificationSink, Subscription, SubscriptionRepository, User } from '../types';
import { errorMessage } from '../utils/errors';
import { displayName, escapeHtml, formatDate } from '../utils/format';
import logger from '../utils/logger';
import { daysLeft } from '../utils/subscription-status';

export interface SubscriptionCheckerOptions {
  repository: SubscriptionRepository;
  provisioning: ClientRevoker;
  notifier: NotificationSink;
  intervalMs: number;
  /** За сколько дней до окончания предупреждать пользователя */
  warningDays: number;
  now?: () => Date;
}

export interface ExpiredSubscription {
  subscription: Subscription;
  /** false, если конфиг не удалось отозвать на сервере */
  revoked: boolean;
}

export interface SweepReport {
  checked: number;
  expired: ExpiredSubscription[];
  warned: number;
}

/**
 * Периодическая проверка подписок. Истёкшие подписки переводятся в
 * `expired`, а их конфиги отзываются на сервере.
 */
export class SubscriptionChecker {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<SweepReport> | null = null;
  private stopped = false;
  private readonly now: () => Date;

  constructor(private options: SubscriptionCheckerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) return;
    this.stopped = false;

    logger.info('Subscription checker started', {
      intervalMs: this.options.intervalMs,
      warningDays: this.options.warningDays
    });

    this.tick();
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
  }

  /** Останавливает таймер и дожидается текущей проверки */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Subscription checker stopped');
    }
    if (this.current) {
      await this.current;
    }
  }

  /** @returns null, если предыдущая проверка ещё идёт */
  async runSweep(): Promise<SweepReport | null> {
    if (this.current) {
      logger.warn('Previous subscription check is still running, skipping');
      return null;
    }

    this.current = this.sweep();
    try {
      return await this.current;
    } finally {
      this.current = null;
    }
  }

  private tick() {
    if (this.stopped) return;
    this.runSweep().catch((error: unknown) => {
      logger.error('Subscription check failed', { error: errorMessage(error) });
    });
  }

  private async sweep(): Promise<SweepReport> {
    const report: SweepReport = { checked: 0, expired: [], warned: 0 };
    const now = this.now();

    let subscriptions: Subscription[];
    try {
      subscriptions = this.options.repository.getActiveSubscriptions();
    } catch (error) {
      logger.error('Failed to load active subscriptions', { error: errorMessage(error) });
      return report;
    }

    logger.info('Checking subscriptions', { count: subscriptions.length });

    for (const subscription of subscriptions) {
      report.checked++;
      try {
        if (now.getTime() >= subscription.endDate.getTime()) {
          const expired = await this.expire(subscription);
          if (expired) report.expired.push(expired);
          continue;
        }

        const left = daysLeft(subscription.endDate, now);
        if (left <= this.options.warningDays) {
          await this.warn(subscription, left);
          report.warned++;
        }
      } catch (error) {
        logger.error('Failed to process subscription', { subscriptionId: subscription.id, error: errorMessage(error) });
      }
    }

    if (report.expired.length > 0) {
      await this.reportToAdmins(report.expired);
    }

    logger.info('Subscription check finished', {
      checked: report.checked,
      expired: report.expired.length,
      warned: report.warned
    });
    return report;
  }

  private async expire(subscription: Subscription): Promise<ExpiredSubscription | null> {
    const { repository, provisioning } = this.options;
    const expired: Subscription = { ...subscription, status: 'expired' };

    try {
      repository.updateSubscription(expired);
    } catch (error) {
      logger.error('Failed to mark subscription as expired', {
        subscriptionId: subscription.id,
        error: errorMessage(error)
      });
      return null;
    }

    let revoked = false;
    try {
      const server = repository.getServerById(subscription.serverId);
      await provisioning.revokeClientConfig(server, subscription.configFilePath);
      repository.releaseServerSlot(server.id);
      revoked = true;
    } catch (error) {
      logger.error('Failed to revoke client config', {
        subscriptionId: subscription.id,
        serverId: subscription.serverId,
        error: errorMessage(error)
      });
    }

    await this.notifyUser(
      subscription,
      `⏰ Ваша подписка #${subscription.id}${this.planSuffix(subscription)} истекла.\n\n` +
        'Доступ к VPN отключён. Чтобы продолжить пользоваться сервисом, оформите новую подписку: /buy'
    );

    logger.info('Subscription expired', { subscriptionId: subscription.id, revoked });
    return { subscription: expired, revoked };
  }

  private async warn(subscription: Subscription, left: number) {
    await this.notifyUser(
      subscription,
      `⚠️ Ваша подписка #${subscription.id}${this.planSuffix(subscription)} истекает ` +
        `${formatDate(subscription.endDate)} (осталось дней: ${left}).\n\n` +
        'Чтобы не потерять доступ, оформите продление: /buy'
    );
  }

  private async notifyUser(subscription: Subscription, text: string) {
    try {
      const user = this.options.repository.getUserById(subscription.userId);
      await this.options.notifier.notify(user.telegramId, text);
    } catch (error) {
      logger.error('Failed to notify user', {
        subscriptionId: subscription.id,
        userId: subscription.userId,
        error: errorMessage(error)
      });
    }
  }

  private planSuffix(subscription: Subscription): string {
    try {
      return ` (${escapeHtml(this.options.repository.getPlanById(subscription.planId).name)})`;
    } catch (error) {
      logger.warn('Plan not found for subscription', { subscriptionId: subscription.id, error: errorMessage(error) });
      return '';
    }
  }

  private async reportToAdmins(expired: ExpiredSubscription[]) {
    const { repository, notifier } = this.options;
    const lines: string[] = [];

    for (const { subscription, revoked } of expired) {
      try {
        const user = repository.getUserById(subscription.userId);
        const plan = repository.getPlanById(subscription.planId);
        lines.push(
          `• #${subscription.id} ${escapeHtml(displayName(user))} (${user.telegramId}), ` +
            `${escapeHtml(plan.name)}, сервер #${subscription.serverId}` +
            (revoked ? '' : ' ⚠️ конфиг не отозван')
        );
      } catch (error) {
        logger.warn('Skipping subscription in admin report', {
          subscriptionId: subscription.id,
          error: errorMessage(error)
        });
      }
    }

    const text = [`📋 <b>Истекли подписки: ${expired.length}</b>`, '', ...lines].join('\n');

    let admins: User[];
    try {
      admins = repository.getAllAdmins();
    } catch (error) {
      logger.error('Failed to load admins for report', { error: errorMessage(error) });
      return;
    }

    for (const admin of admins) {
      try {
        await notifier.notify(admin.telegramId, text);
      } catch (error) {
        logger.error('Failed to send report to admin', { adminId: admin.telegramId, error: errorMessage(error) });
      }
    }
  }
}
