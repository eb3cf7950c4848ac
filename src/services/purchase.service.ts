import {
  ClientProvisioner,
  PaymentRefunder,
  PaymentStatus,
  Server,
  StarsCharge,
  Subscription,
  SubscriptionPlan,
  User
} from '../types';
import { NotFoundError, PurchaseError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import { DAY_MS } from '../utils/subscription-status';
import { DatabaseService } from './database.service';

export const PAYMENT_METHOD_STARS = 'telegram_stars';

export interface PurchaseResult {
  subscription: Subscription;
  plan: SubscriptionPlan;
  server: Server;
  configPath: string;
}

export class PurchaseService {
  constructor(
    private db: DatabaseService,
    private provisioning: ClientProvisioner,
    private refunder: PaymentRefunder,
    private now: () => Date = () => new Date()
  ) {}

  /** Тариф, доступный для покупки, или null */
  findPurchasablePlan(planId: number): SubscriptionPlan | null {
    try {
      const plan = this.db.getPlanById(planId);
      return plan.isActive ? plan : null;
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  /**
   * Выдаёт подписку по уже оплаченному счёту. При ошибке место на сервере
   * освобождается, платёж возвращается, а исходная ошибка пробрасывается.
   */
  async purchase(user: User, planId: number, charge: StarsCharge): Promise<PurchaseResult> {
    logger.info('Processing purchase', { userId: user.id, planId, chargeId: charge.chargeId });

    let server: Server | null = null;
    let configPath: string | null = null;

    try {
      const plan = this.findPurchasablePlan(planId);
      if (!plan) {
        throw new PurchaseError('PLAN_UNAVAILABLE', `Subscription plan #${planId} is not available`);
      }

      server = this.db.reserveServerSlot();
      if (!server) {
        throw new PurchaseError('NO_CAPACITY', 'No active server has free slots');
      }

      await this.provisioning.setupServer(server);
      configPath = await this.provisioning.createClientConfig(server, `user_${user.id}`);

      const startDate = this.now();
      const subscription = this.db.addSubscription({
        userId: user.id,
        serverId: server.id,
        planId: plan.id,
        startDate,
        endDate: new Date(startDate.getTime() + plan.duration * DAY_MS),
        status: 'active',
        configFilePath: configPath
      });

      this.db.addPayment({
        userId: user.id,
        subscriptionId: subscription.id,
        amount: charge.amount,
        paymentMethod: PAYMENT_METHOD_STARS,
        paymentId: charge.chargeId,
        status: 'completed'
      });

      logger.info('Subscription purchased', { userId: user.id, subscriptionId: subscription.id, serverId: server.id });
      return { subscription, plan, server, configPath };
    } catch (error) {
      logger.error('Purchase failed', { userId: user.id, planId, error: errorMessage(error) });
      await this.compensate(user, charge, server, configPath);
      throw error;
    }
  }

  private async compensate(user: User, charge: StarsCharge, server: Server | null, configPath: string | null) {
    if (server && configPath) {
      try {
        await this.provisioning.revokeClientConfig(server, configPath);
      } catch (error) {
        logger.error('Failed to revoke config of failed purchase', { configPath, error: errorMessage(error) });
      }
    }
    if (server) {
      this.db.releaseServerSlot(server.id);
    }

    let status: PaymentStatus = 'failed';
    try {
      await this.refunder.refund(user.telegramId, charge.chargeId);
      status = 'refunded';
    } catch (error) {
      logger.error('Refund failed', { userId: user.id, chargeId: charge.chargeId, error: errorMessage(error) });
    }

    this.db.addPayment({
      userId: user.id,
      subscriptionId: null,
      amount: charge.amount,
      paymentMethod: PAYMENT_METHOD_STARS,
      paymentId: charge.chargeId,
      status
    });
  }
}
