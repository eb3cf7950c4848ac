import { readFile } from 'fs/promises';
import { basename } from 'path';
import { Api, Context, InputFile } from 'grammy';
import { DatabaseService } from '../services/database.service';
import { PurchaseResult, PurchaseService } from '../services/purchase.service';
import { PaymentRefunder } from '../types';
import { PurchaseError, describeError, isTransportError } from '../utils/errors';
import { escapeHtml, formatDate } from '../utils/format';
import logger from '../utils/logger';
import { QRCodeGenerator } from '../utils/qrcode';

/** Валюта Telegram Stars */
export const STARS_CURRENCY = 'XTR';

const PAYLOAD_PREFIX = 'plan:';

export function planPayload(planId: number): string {
  return `${PAYLOAD_PREFIX}${planId}`;
}

export function parsePlanPayload(payload: string): number | null {
  if (!payload.startsWith(PAYLOAD_PREFIX)) return null;
  const id = Number(payload.slice(PAYLOAD_PREFIX.length));
  return Number.isInteger(id) && id > 0 ? id : null;
}

/** Возврат звёзд через Bot API */
export class StarsRefunder implements PaymentRefunder {
  constructor(private api: Api) {}

  async refund(telegramId: number, chargeId: string): Promise<void> {
    await this.api.refundStarPayment(telegramId, chargeId);
    logger.info('Stars payment refunded', { telegramId, chargeId });
  }
}

export class PaymentHandler {
  constructor(
    private db: DatabaseService,
    private purchaseService: PurchaseService,
    private qrGenerator: QRCodeGenerator
  ) {}

  async handleBuy(ctx: Context) {
    const plans = this.db.getActivePlans();
    if (plans.length === 0) {
      await ctx.reply('😔 Сейчас нет доступных тарифов. Попробуйте позже.');
      return;
    }

    await ctx.reply('💳 <b>Выберите тариф</b>\n\nОплата принимается в Telegram Stars ⭐', { parse_mode: 'HTML' });

    for (const plan of plans) {
      await ctx.replyWithInvoice(
        `VPN: ${plan.name}`,
        `${plan.description}. Срок: ${plan.duration} дн.`,
        planPayload(plan.id),
        STARS_CURRENCY,
        [{ label: plan.name, amount: plan.price }]
      );
    }

    logger.info('Invoices sent', { userId: ctx.from?.id, plans: plans.length });
  }

  async handlePreCheckout(ctx: Context) {
    const query = ctx.preCheckoutQuery;
    if (!query) return;

    const planId = parsePlanPayload(query.invoice_payload);
    const plan = planId === null ? null : this.purchaseService.findPurchasablePlan(planId);

    if (!plan || query.currency !== STARS_CURRENCY || query.total_amount !== plan.price) {
      logger.warn('Pre-checkout rejected', { userId: query.from.id, payload: query.invoice_payload });
      await ctx.answerPreCheckoutQuery(false, 'Этот тариф больше недоступен. Выберите другой: /buy');
      return;
    }

    await ctx.answerPreCheckoutQuery(true);
  }

  async handleSuccessfulPayment(ctx: Context) {
    const payment = ctx.message?.successful_payment;
    const from = ctx.from;
    if (!payment || !from) return;

    const user = this.db.upsertUser({
      telegramId: from.id,
      username: from.username,
      firstName: from.first_name,
      lastName: from.last_name
    });

    logger.info('Payment received', {
      userId: user.id,
      chargeId: payment.telegram_payment_charge_id,
      amount: payment.total_amount
    });

    await ctx.reply('⏳ Оплата получена. Создаю вашу конфигурацию...');

    let result: PurchaseResult;
    try {
      result = await this.purchaseService.purchase(user, parsePlanPayload(payment.invoice_payload) ?? 0, {
        chargeId: payment.telegram_payment_charge_id,
        amount: payment.total_amount
      });
    } catch (error) {
      await ctx.reply(this.failureMessage(error), { parse_mode: 'HTML' });
      return;
    }

    try {
      await this.deliver(ctx, result);
    } catch (error) {
      logger.error('Failed to deliver config', {
        subscriptionId: result.subscription.id,
        error: describeError(error)
      });
      await ctx.reply(
        `⚠️ Подписка #${result.subscription.id} оформлена, но отправить конфигурацию не удалось. ` +
          'Свяжитесь с администратором.'
      );
    }
  }

  private async deliver(ctx: Context, result: PurchaseResult) {
    const { subscription, plan, configPath } = result;
    const config = await readFile(configPath, 'utf-8');

    await ctx.replyWithDocument(new InputFile(Buffer.from(config, 'utf-8'), basename(configPath)), {
      caption: '📄 Файл конфигурации WireGuard'
    });

    const qrBuffer = await this.qrGenerator.generateQRCode(config);
    if (qrBuffer) {
      await ctx.replyWithPhoto(new InputFile(qrBuffer, 'wireguard-qr.png'), {
        caption: '📱 QR-код для быстрого подключения'
      });
    }

    const summary = `
✅ <b>Подписка оформлена!</b>

<b>Номер:</b> #${subscription.id}
<b>Тариф:</b> ${escapeHtml(plan.name)}
<b>Действует до:</b> ${formatDate(subscription.endDate)}

Импортируйте файл или отсканируйте QR-код в приложении WireGuard.
Ваши подписки: /mysubs
    `.trim();

    await ctx.reply(summary, { parse_mode: 'HTML' });
    logger.info('Configuration sent successfully', { subscriptionId: subscription.id });
  }

  private failureMessage(error: unknown): string {
    if (error instanceof PurchaseError && error.reason === 'NO_CAPACITY') {
      return '😔 Сейчас нет свободных мест на серверах. Оплата будет возвращена.';
    }
    if (error instanceof PurchaseError) {
      return '❌ Этот тариф больше недоступен. Оплата будет возвращена.';
    }
    if (isTransportError(error)) {
      return '😔 Сервер VPN сейчас недоступен. Оплата будет возвращена, попробуйте позже: /buy';
    }
    return (
      `❌ Не удалось создать конфигурацию: ${escapeHtml(describeError(error))}\n\n` +
      'Оплата будет возвращена. Если звёзды не вернулись, свяжитесь с администратором.'
    );
  }
}
